import * as path from 'path';
import { MediaDownloader, Publisher, VideoSource } from '../collaborators/interfaces/collaborators.interface';
import { Comment, Compilation, SourceVideo, UploadDetails } from '../common/interfaces/pipeline.interface';
import { FakeFfprobe } from './fake-media-tools';

export class FakeVideoSource implements VideoSource {
  videos: SourceVideo[] = [];
  readonly comments = new Map<string, Comment[]>();
  /** Errors thrown, in order, before the comments of a video are returned */
  readonly commentFailures = new Map<string, Error[]>();
  listFailure: Error | null = null;
  readonly commentCalls: string[] = [];

  async listCandidateVideos(_channelOrPlaylistId: string, limit: number): Promise<SourceVideo[]> {
    if (this.listFailure) throw this.listFailure;
    return this.videos.slice(0, limit);
  }

  async listComments(videoId: string): Promise<Comment[]> {
    this.commentCalls.push(videoId);
    const failure = this.commentFailures.get(videoId)?.shift();
    if (failure) throw failure;
    return this.comments.get(videoId) ?? [];
  }
}

/**
 * Writes <id>.mp4 into the target directory and registers it with the
 * fake probe. The media duration defaults to the listed video duration.
 */
export class FakeMediaDownloader implements MediaDownloader {
  readonly durations = new Map<string, number>();
  readonly failures = new Map<string, Error>();

  constructor(private readonly probe: FakeFfprobe, private readonly defaultDuration = 600) {}

  async download(videoId: string, targetDir: string): Promise<string> {
    const failure = this.failures.get(videoId);
    if (failure) throw failure;

    const filePath = path.join(targetDir, `${videoId}.mp4`);
    this.probe.addMedia(filePath, this.durations.get(videoId) ?? this.defaultDuration);
    return filePath;
  }
}

export class FakePublisher implements Publisher {
  readonly published: Array<{ compilation: Compilation; details: UploadDetails }> = [];
  readonly existing = new Map<string, string>();
  failure: Error | null = null;

  async publish(compilation: Compilation, details: UploadDetails): Promise<string> {
    if (this.failure) throw this.failure;
    this.published.push({ compilation, details });
    return `out-${this.published.length}`;
  }

  async findExistingUpload(_video: SourceVideo, title: string): Promise<string | null> {
    return this.existing.get(title) ?? null;
  }
}
