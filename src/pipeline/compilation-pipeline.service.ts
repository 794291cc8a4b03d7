import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ClipError,
  CollaboratorError,
  PipelineCancelledError,
  PipelineError,
  errorMessage,
  throwIfCancelled,
} from '../common/errors';
import { ClipFile, Comment, PassSummary, SourceVideo } from '../common/interfaces/pipeline.interface';
import { withRetry } from '../common/utils/retry.util';
import { formatRange } from '../common/utils/time-format.util';
import {
  clipPath,
  clipsDir,
  compilationPath,
  removeDirIfEmpty,
  removeFiles,
  videoWorkDir,
} from '../common/utils/work-dir.util';
import {
  MEDIA_DOWNLOADER,
  MediaDownloader,
  PUBLISHER,
  Publisher,
  VIDEO_SOURCE,
  VideoSource,
} from '../collaborators/interfaces/collaborators.interface';
import { buildUploadDetails, compilationTitle } from '../collaborators/upload-details';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';
import { ProcessingLedgerService } from '../ledger/processing-ledger.service';
import { SkipListService } from '../ledger/skip-list.service';
import { ClipExtractorService } from '../media/clip-extractor.service';
import { CompilationAssemblerService } from '../media/compilation-assembler.service';
import { SegmentFilterService } from '../segments/segment-filter.service';
import { TimestampParserService } from '../segments/timestamp-parser.service';
import {
  PIPELINE_EVENTS,
  SkipReason,
  VideoFailedEvent,
  VideoProcessedEvent,
  VideoSkippedEvent,
} from './pipeline-events';

type VideoResult = 'processed' | 'skipped';

function isAuthFailure(error: unknown): error is CollaboratorError {
  return error instanceof CollaboratorError && error.kind === 'AuthFailure';
}

function isNotFound(error: unknown): error is CollaboratorError {
  return error instanceof CollaboratorError && error.kind === 'NotFound';
}

/**
 * One pass over the configured channel: every candidate video not yet in
 * the ledger is parsed, clipped, assembled, published and recorded, one
 * video at a time.
 */
@Injectable()
export class CompilationPipelineService {
  private readonly logger = new Logger(CompilationPipelineService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(VIDEO_SOURCE) private readonly videoSource: VideoSource,
    @Inject(MEDIA_DOWNLOADER) private readonly downloader: MediaDownloader,
    @Inject(PUBLISHER) private readonly publisher: Publisher,
    private readonly parser: TimestampParserService,
    private readonly segmentFilter: SegmentFilterService,
    private readonly clipExtractor: ClipExtractorService,
    private readonly assembler: CompilationAssemblerService,
    private readonly ledger: ProcessingLedgerService,
    private readonly skipList: SkipListService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Run a single pass. The signal is checked between videos and between
   * segments; a cancelled video leaves no record and no files behind.
   * AuthFailure ends the pass by rethrowing.
   */
  async runPass(signal: AbortSignal = new AbortController().signal): Promise<PassSummary> {
    const summary: PassSummary = { candidates: 0, processed: [], skipped: [], failed: [], cancelled: false };

    this.ledger.open();

    let videos: SourceVideo[];
    try {
      videos = await this.retry(
        () => this.videoSource.listCandidateVideos(this.config.channelId, this.config.maxCandidateVideos),
        `list ${this.config.channelId}`,
        signal,
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        summary.cancelled = true;
        return this.complete(summary);
      }
      if (isAuthFailure(error)) {
        throw error;
      }
      this.logger.error(`Could not list candidate videos for ${this.config.channelId}: ${errorMessage(error)}`);
      return this.complete(summary);
    }

    summary.candidates = videos.length;
    this.logger.log(`Pass started: ${videos.length} candidate video(s)`);

    for (const video of videos) {
      if (signal.aborted) {
        summary.cancelled = true;
        break;
      }

      try {
        const result = await this.processVideo(video, signal);
        summary[result].push(video.id);
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          this.logger.warn(`[${video.id}] Cancelled, nothing recorded`);
          summary.cancelled = true;
          break;
        }

        this.fail(video, error);
        if (isAuthFailure(error)) {
          throw error;
        }
        summary.failed.push(video.id);
      }
    }

    return this.complete(summary);
  }

  private async processVideo(video: SourceVideo, signal: AbortSignal): Promise<VideoResult> {
    if (this.ledger.has(video.id)) {
      return this.skip(video, 'already-processed');
    }
    if (this.skipList.isSkipped(video.id)) {
      return this.skip(video, 'skip-listed');
    }

    if (this.config.duplicateDetection) {
      const title = compilationTitle(this.config.videoNamePrefix, video.title);
      const existing = await this.retry(() => this.publisher.findExistingUpload(video, title), `find ${video.id}`, signal);
      if (existing) {
        this.logger.log(`[${video.id}] Already published as ${existing}, recording without re-uploading`);
        this.ledger.record(video.id, existing);
        return this.skip(video, 'duplicate');
      }
    }

    this.logger.log(`[${video.id}] Processing "${video.title}" (${video.durationSeconds}s)`);

    let comments: Comment[];
    try {
      comments = await this.retry(() => this.videoSource.listComments(video.id), `comments ${video.id}`, signal);
    } catch (error) {
      if (isNotFound(error)) return this.skipNotFound(video, error);
      throw error;
    }

    const parsed = this.parser.parseComments(comments, this.config.timestampCommenters);
    const segments = this.segmentFilter.filter(parsed.ranges, video, {
      keywords: this.config.keywords,
      excludeKeywords: this.config.excludeKeywords,
    });

    this.logger.log(
      `[${video.id}] ${parsed.eligibleComments} eligible comment(s), ${parsed.ranges.length} range(s), ${segments.length} segment(s) after filtering`,
    );
    if (segments.length === 0) {
      return this.skip(video, 'no-segments');
    }

    throwIfCancelled(signal);

    const tempFiles: string[] = [];
    let mediaPath: string | null = null;

    try {
      const sourceMedia = await this.fetchMedia(video, signal);
      if (sourceMedia === null) {
        return this.skip(video, 'not-found');
      }
      mediaPath = sourceMedia;

      const clips: ClipFile[] = [];
      for (const segment of segments) {
        throwIfCancelled(signal);

        const output = clipPath(this.config.workDir, segment);
        tempFiles.push(output);

        try {
          clips.push(await this.clipExtractor.extract(sourceMedia, segment, output));
        } catch (error) {
          if (!(error instanceof ClipError)) throw error;
          this.logger.warn(`[${video.id}] Segment ${formatRange(segment)} left out (${error.kind}): ${error.message}`);
        }
      }

      if (clips.length === 0) {
        return this.skip(video, 'no-clips');
      }

      throwIfCancelled(signal);

      const output = compilationPath(this.config.workDir, video.id);
      tempFiles.push(output);
      const compilation = await this.assembler.assemble(clips, output);

      throwIfCancelled(signal);

      const details = buildUploadDetails(video, compilation, {
        prefix: this.config.videoNamePrefix,
        tags: this.config.videoTags,
        privacy: this.config.uploadPrivacy,
      });
      const outputVideoId = await this.retry(() => this.publisher.publish(compilation, details), `publish ${video.id}`, signal);

      this.ledger.record(video.id, outputVideoId);

      this.logger.log(`[${video.id}] Published ${clips.length} clip(s), ${compilation.durationSeconds.toFixed(2)}s, as ${outputVideoId}`);
      this.eventEmitter.emit(PIPELINE_EVENTS.VIDEO_PROCESSED, {
        videoId: video.id,
        outputVideoId,
        clips: clips.length,
        durationSeconds: compilation.durationSeconds,
      } satisfies VideoProcessedEvent);
      return 'processed';
    } finally {
      await this.cleanup(video.id, tempFiles, mediaPath);
    }
  }

  /**
   * Local media for the video, or null when the source no longer has it
   * (the video is then put on the skip list)
   */
  private async fetchMedia(video: SourceVideo, signal: AbortSignal): Promise<string | null> {
    try {
      return await this.retry(
        () => this.downloader.download(video.id, videoWorkDir(this.config.workDir, video.id)),
        `download ${video.id}`,
        signal,
      );
    } catch (error) {
      if (!isNotFound(error)) throw error;
      this.skipList.skip(video.id, error.message);
      return null;
    }
  }

  private skip(video: SourceVideo, reason: SkipReason): VideoResult {
    if (reason === 'already-processed') {
      this.logger.debug(`[${video.id}] Skipped: ${reason}`);
    } else {
      this.logger.log(`[${video.id}] Skipped: ${reason}`);
    }
    this.eventEmitter.emit(PIPELINE_EVENTS.VIDEO_SKIPPED, { videoId: video.id, reason } satisfies VideoSkippedEvent);
    return 'skipped';
  }

  private skipNotFound(video: SourceVideo, error: CollaboratorError): VideoResult {
    this.skipList.skip(video.id, error.message);
    return this.skip(video, 'not-found');
  }

  private fail(video: SourceVideo, error: unknown): void {
    const kind = error instanceof PipelineError ? error.kind : undefined;
    this.logger.error(`[${video.id}] Failed${kind ? ` (${kind})` : ''}: ${errorMessage(error)}`);
    this.eventEmitter.emit(PIPELINE_EVENTS.VIDEO_FAILED, {
      videoId: video.id,
      error: errorMessage(error),
      kind,
    } satisfies VideoFailedEvent);
  }

  private complete(summary: PassSummary): PassSummary {
    this.logger.log(
      `Pass ${summary.cancelled ? 'cancelled' : 'finished'}: ${summary.processed.length} processed, ` +
      `${summary.skipped.length} skipped, ${summary.failed.length} failed of ${summary.candidates}`,
    );
    return summary;
  }

  private retry<T>(operation: () => Promise<T>, label: string, signal: AbortSignal): Promise<T> {
    return withRetry(operation, {
      retries: this.config.retryAttempts,
      backoffMs: this.config.retryBackoffMs,
      signal,
      label,
    });
  }

  /**
   * Remove the video's clips and compilation, and the download unless it
   * is kept. A file that cannot be removed is logged, never fatal.
   */
  private async cleanup(videoId: string, tempFiles: string[], mediaPath: string | null): Promise<void> {
    const paths = [...tempFiles];
    if (mediaPath && !this.config.keepDownloads) {
      paths.push(mediaPath);
    }

    const failed = await removeFiles(paths);
    await removeDirIfEmpty(clipsDir(this.config.workDir, videoId));
    await removeDirIfEmpty(videoWorkDir(this.config.workDir, videoId));

    if (failed.length > 0) {
      this.logger.warn(`[${videoId}] ${failed.length} temporary file(s) left behind`);
    }
  }
}
