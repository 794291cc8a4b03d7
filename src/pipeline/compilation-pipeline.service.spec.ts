import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { FfmpegBridge, FfprobeBridge } from '../bridges';
import { MEDIA_DOWNLOADER, PUBLISHER, VIDEO_SOURCE } from '../collaborators/interfaces/collaborators.interface';
import { classifyYtDlpFailure } from '../collaborators/ytdlp-failure';
import { CollaboratorError, LedgerError } from '../common/errors';
import { Comment, SourceVideo } from '../common/interfaces/pipeline.interface';
import { PIPELINE_CONFIG } from '../config/pipeline-config';
import { LedgerDatabaseService } from '../ledger/ledger-database.service';
import { ProcessingLedgerService } from '../ledger/processing-ledger.service';
import { SkipListService } from '../ledger/skip-list.service';
import { ClipExtractorService } from '../media/clip-extractor.service';
import { CompilationAssemblerService } from '../media/compilation-assembler.service';
import { SegmentFilterService } from '../segments/segment-filter.service';
import { TimestampParserService } from '../segments/timestamp-parser.service';
import { FakeMediaDownloader, FakePublisher, FakeVideoSource } from '../test-utils/fake-collaborators';
import { FakeFfmpeg, FakeFfprobe } from '../test-utils/fake-media-tools';
import { testConfig } from '../test-utils/test-config';
import { CompilationPipelineService } from './compilation-pipeline.service';
import { PIPELINE_EVENTS, VideoFailedEvent, VideoProcessedEvent, VideoSkippedEvent } from './pipeline-events';

describe('CompilationPipelineService', () => {
  let root: string;
  let workDir: string;
  let moduleRef: TestingModule;
  let pipeline: CompilationPipelineService;
  let ledger: ProcessingLedgerService;
  let ffprobe: FakeFfprobe;
  let ffmpeg: FakeFfmpeg;
  let source: FakeVideoSource;
  let downloader: FakeMediaDownloader;
  let publisher: FakePublisher;
  let processedEvents: VideoProcessedEvent[];
  let skippedEvents: VideoSkippedEvent[];
  let failedEvents: VideoFailedEvent[];

  const video = (id: string, title = 'Morning stream', durationSeconds = 600): SourceVideo => ({ id, title, durationSeconds });
  const comment = (text: string, author = 'alice'): Comment => ({ author, text, postedAt: null });

  async function createPipeline(env: Record<string, string> = {}): Promise<void> {
    ffprobe = new FakeFfprobe();
    ffmpeg = new FakeFfmpeg(ffprobe);
    source = new FakeVideoSource();
    downloader = new FakeMediaDownloader(ffprobe);
    publisher = new FakePublisher();

    moduleRef = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [
        CompilationPipelineService,
        TimestampParserService,
        SegmentFilterService,
        ClipExtractorService,
        CompilationAssemblerService,
        LedgerDatabaseService,
        ProcessingLedgerService,
        SkipListService,
        { provide: FfmpegBridge, useValue: ffmpeg },
        { provide: FfprobeBridge, useValue: ffprobe },
        { provide: VIDEO_SOURCE, useValue: source },
        { provide: MEDIA_DOWNLOADER, useValue: downloader },
        { provide: PUBLISHER, useValue: publisher },
        {
          provide: PIPELINE_CONFIG,
          useValue: testConfig({
            WORK_DIR: workDir,
            LEDGER_PATH: path.join(root, 'ledger', 'processed_videos.db'),
            KEYWORDS: 'tingles',
            ...env,
          }),
        },
      ],
    }).compile();

    pipeline = moduleRef.get(CompilationPipelineService);
    ledger = moduleRef.get(ProcessingLedgerService);

    processedEvents = [];
    skippedEvents = [];
    failedEvents = [];
    const events = moduleRef.get(EventEmitter2);
    events.on(PIPELINE_EVENTS.VIDEO_PROCESSED, (event: VideoProcessedEvent) => processedEvents.push(event));
    events.on(PIPELINE_EVENTS.VIDEO_SKIPPED, (event: VideoSkippedEvent) => skippedEvents.push(event));
    events.on(PIPELINE_EVENTS.VIDEO_FAILED, (event: VideoFailedEvent) => failedEvents.push(event));
  }

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
    workDir = path.join(root, 'work');
    await createPipeline();
  });

  afterEach(async () => {
    await moduleRef.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('a video with usable timestamps', () => {
    beforeEach(() => {
      source.videos = [video('v1')];
      source.comments.set('v1', [
        comment('2:00 intro\n2:45 tingles\n5:00 outro'),
        comment('9:50 end'),
      ]);
    });

    it('extracts, assembles, publishes and records it', async () => {
      const summary = await pipeline.runPass();

      expect(summary).toEqual({ candidates: 1, processed: ['v1'], skipped: [], failed: [], cancelled: false });
      expect(processedEvents).toEqual([{ videoId: 'v1', outputVideoId: 'out-1', clips: 1, durationSeconds: 45 }]);
      expect(ledger.get('v1')?.outputVideoId).toBe('out-1');
    });

    it('publishes the compilation with its upload details', async () => {
      await pipeline.runPass();

      expect(publisher.published).toHaveLength(1);
      const [{ compilation, details }] = publisher.published;
      expect(compilation.sourceVideoId).toBe('v1');
      expect(compilation.clips.map(clip => clip.segment)).toEqual([
        { sourceVideoId: 'v1', start: 120, end: 165, description: 'intro / tingles' },
      ]);
      expect(details).toEqual({
        title: '[Compilation] Morning stream',
        description: 'Clips from: Morning stream\nhttps://youtu.be/v1\n\nSegments:\n2:00-2:45 intro / tingles',
        tags: [],
        privacy: 'private',
      });
    });

    it('removes the download and every temporary file', async () => {
      await pipeline.runPass();

      expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
    });

    it('keeps the download when asked to', async () => {
      await moduleRef.close();
      await createPipeline({ KEEP_DOWNLOADS: 'true' });
      source.videos = [video('v1')];
      source.comments.set('v1', [comment('2:00 intro\n2:45 tingles')]);

      await pipeline.runPass();

      expect(fs.readdirSync(path.join(workDir, 'v1'))).toEqual(['v1.mp4']);
    });

    it('skips it on the next pass', async () => {
      await pipeline.runPass();
      const summary = await pipeline.runPass();

      expect(summary.skipped).toEqual(['v1']);
      expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'already-processed' }]);
      expect(publisher.published).toHaveLength(1);
      expect(source.commentCalls).toEqual(['v1']);
    });

    it('remembers it across a restart', async () => {
      await pipeline.runPass();
      await moduleRef.close();

      await createPipeline();
      source.videos = [video('v1')];
      const summary = await pipeline.runPass();

      expect(summary.skipped).toEqual(['v1']);
      expect(source.commentCalls).toEqual([]);
    });
  });

  it('leaves out segments the media does not reach', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('0:10 - 0:40 tingles one\n5:10 - 5:40 tingles two')]);
    downloader.durations.set('v1', 300);

    const summary = await pipeline.runPass();

    expect(summary.processed).toEqual(['v1']);
    expect(processedEvents).toEqual([{ videoId: 'v1', outputVideoId: 'out-1', clips: 1, durationSeconds: 30 }]);
  });

  it('skips without recording when no clip could be extracted', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('5:10 - 5:40 tingles')]);
    downloader.durations.set('v1', 100);

    const summary = await pipeline.runPass();

    expect(summary.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'no-clips' }]);
    expect(ledger.has('v1')).toBe(false);
    expect(publisher.published).toEqual([]);
    expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
  });

  it('ignores timestamps from authors that are not allowed', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles', 'mallory')]);

    const summary = await pipeline.runPass();

    expect(summary.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'no-segments' }]);
    expect(ffmpeg.calls).toEqual([]);
    expect(ledger.has('v1')).toBe(false);
  });

  it('drops segments whose description has no keyword', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 chatting')]);

    const summary = await pipeline.runPass();

    expect(summary.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'no-segments' }]);
  });

  it('puts a vanished video on the skip list', async () => {
    source.videos = [video('v1')];
    source.commentFailures.set('v1', [new CollaboratorError('NotFound', 'v1: not found (Video unavailable)')]);

    await pipeline.runPass();
    const second = await pipeline.runPass();

    expect(second.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([
      { videoId: 'v1', reason: 'not-found' },
      { videoId: 'v1', reason: 'skip-listed' },
    ]);
    expect(source.commentCalls).toEqual(['v1']);
    expect(ledger.has('v1')).toBe(false);
    expect(moduleRef.get(SkipListService).get('v1')?.reason).toBe('v1: not found (Video unavailable)');
  });

  it('puts a video whose media is gone on the skip list', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    downloader.failures.set('v1', new CollaboratorError('NotFound', 'v1: not found (Private video)'));

    const summary = await pipeline.runPass();

    expect(summary.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'not-found' }]);
    expect(moduleRef.get(SkipListService).isSkipped('v1')).toBe(true);
  });

  it('stops the pass on an authentication failure', async () => {
    source.videos = [video('v1'), video('v2')];
    source.commentFailures.set('v1', [new CollaboratorError('AuthFailure', 'v1: authentication required (ERROR: [youtube] v1: Sign in to confirm you\'re not a bot)')]);

    await expect(pipeline.runPass()).rejects.toMatchObject({ kind: 'AuthFailure' });
    expect(source.commentCalls).toEqual(['v1']);
    expect(failedEvents).toEqual([
      { videoId: 'v1', error: 'v1: authentication required (ERROR: [youtube] v1: Sign in to confirm you\'re not a bot)', kind: 'AuthFailure' },
    ]);
  });

  it('moves past a private video and skips it on the next pass', async () => {
    const privateVideo = classifyYtDlpFailure(
      "ERROR: [youtube] private1: Private video. Sign in if you've been granted access to this video",
      'private1',
    );
    if (!privateVideo) throw new Error('private video stderr was not classified');
    source.videos = [video('private1'), video('public02')];
    source.commentFailures.set('private1', [privateVideo]);
    source.comments.set('public02', [comment('1:00 - 1:30 tingles')]);

    const first = await pipeline.runPass();
    const second = await pipeline.runPass();

    expect(first).toEqual({ candidates: 2, processed: ['public02'], skipped: ['private1'], failed: [], cancelled: false });
    expect(second.skipped).toEqual(['private1', 'public02']);
    expect(skippedEvents).toEqual([
      { videoId: 'private1', reason: 'not-found' },
      { videoId: 'private1', reason: 'skip-listed' },
      { videoId: 'public02', reason: 'already-processed' },
    ]);
    expect(ledger.has('private1')).toBe(false);
    expect(moduleRef.get(SkipListService).isSkipped('private1')).toBe(true);
  });

  it('retries rate limited calls', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    source.commentFailures.set('v1', [
      new CollaboratorError('RateLimited', 'v1: rate limited (HTTP Error 429)'),
      new CollaboratorError('RateLimited', 'v1: rate limited (HTTP Error 429)'),
    ]);

    const summary = await pipeline.runPass();

    expect(summary.processed).toEqual(['v1']);
    expect(source.commentCalls).toEqual(['v1', 'v1', 'v1']);
  });

  it('fails the video once retries are used up and moves on', async () => {
    source.videos = [video('v1'), video('v2')];
    source.comments.set('v2', [comment('1:00 - 1:30 tingles')]);
    source.commentFailures.set(
      'v1',
      Array.from({ length: 4 }, () => new CollaboratorError('RateLimited', 'v1: rate limited (HTTP Error 429)')),
    );

    const summary = await pipeline.runPass();

    expect(summary).toEqual({ candidates: 2, processed: ['v2'], skipped: [], failed: ['v1'], cancelled: false });
    expect(source.commentCalls).toEqual(['v1', 'v1', 'v1', 'v1', 'v2']);
    expect(ledger.has('v1')).toBe(false);
  });

  it('records nothing when publishing fails', async () => {
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    publisher.failure = new Error('export directory is not writable');

    const summary = await pipeline.runPass();

    expect(summary.failed).toEqual(['v1']);
    expect(failedEvents).toEqual([{ videoId: 'v1', error: 'export directory is not writable', kind: undefined }]);
    expect(ledger.has('v1')).toBe(false);
    expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
  });

  it('fails the video when assembly fails and moves on', async () => {
    source.videos = [video('v1'), video('v2')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    source.comments.set('v2', [comment('2:00 - 2:20 tingles')]);
    // The clip of v1 encodes, its assembly run is the one that fails
    ffmpeg.onRun = () => {
      ffmpeg.failures = 1;
      ffmpeg.onRun = undefined;
    };

    const summary = await pipeline.runPass();

    expect(summary).toEqual({ candidates: 2, processed: ['v2'], skipped: [], failed: ['v1'], cancelled: false });
    expect(failedEvents.map(event => [event.videoId, event.kind])).toEqual([['v1', 'EncodeFailure']]);
    expect(ledger.has('v1')).toBe(false);
    expect(ledger.has('v2')).toBe(true);
    expect(publisher.published.map(entry => entry.compilation.sourceVideoId)).toEqual(['v2']);
    expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
  });

  it('fails the video when the ledger cannot be written and moves on', async () => {
    source.videos = [video('v1'), video('v2')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    source.comments.set('v2', [comment('2:00 - 2:20 tingles')]);
    jest.spyOn(ledger, 'record').mockImplementationOnce(() => {
      throw new LedgerError('WriteFailure', '[v1] Could not write ledger record: disk I/O error');
    });

    const summary = await pipeline.runPass();

    expect(summary).toEqual({ candidates: 2, processed: ['v2'], skipped: [], failed: ['v1'], cancelled: false });
    expect(failedEvents).toEqual([
      { videoId: 'v1', error: '[v1] Could not write ledger record: disk I/O error', kind: 'WriteFailure' },
    ]);
    expect(ledger.has('v1')).toBe(false);
    expect(ledger.get('v1')).toBeNull();
    expect(ledger.get('v2')?.outputVideoId).toBe('out-2');
    expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
  });

  it('records an existing upload instead of publishing again', async () => {
    await moduleRef.close();
    await createPipeline({ DUPLICATE_DETECTION: 'true' });
    source.videos = [video('v1')];
    source.comments.set('v1', [comment('1:00 - 1:30 tingles')]);
    publisher.existing.set('[Compilation] Morning stream', 'existing-7');

    const summary = await pipeline.runPass();

    expect(summary.skipped).toEqual(['v1']);
    expect(skippedEvents).toEqual([{ videoId: 'v1', reason: 'duplicate' }]);
    expect(ledger.get('v1')?.outputVideoId).toBe('existing-7');
    expect(source.commentCalls).toEqual([]);
    expect(publisher.published).toEqual([]);
  });

  it('returns an empty summary when the listing fails', async () => {
    source.listFailure = new Error('network is unreachable');

    const summary = await pipeline.runPass();

    expect(summary).toEqual({ candidates: 0, processed: [], skipped: [], failed: [], cancelled: false });
  });

  describe('cancellation', () => {
    it('stops before the first video when already cancelled', async () => {
      source.videos = [video('v1')];
      const controller = new AbortController();
      controller.abort();

      const summary = await pipeline.runPass(controller.signal);

      expect(summary).toEqual({ candidates: 0, processed: [], skipped: [], failed: [], cancelled: true });
    });

    it('abandons the current video between segments', async () => {
      source.videos = [video('v1'), video('v2')];
      source.comments.set('v1', [comment('1:00 - 1:30 tingles one\n3:00 - 3:30 tingles two')]);
      const controller = new AbortController();
      ffmpeg.onRun = () => controller.abort();

      const summary = await pipeline.runPass(controller.signal);

      expect(summary).toEqual({ candidates: 2, processed: [], skipped: [], failed: [], cancelled: true });
      expect(ffmpeg.calls).toHaveLength(1);
      expect(ledger.has('v1')).toBe(false);
      expect(publisher.published).toEqual([]);
      expect(source.commentCalls).toEqual(['v1']);
      expect(fs.existsSync(path.join(workDir, 'v1'))).toBe(false);
    });
  });
});
