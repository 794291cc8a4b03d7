import { Injectable, Logger } from '@nestjs/common';
import { YtDlpBridge, type YtDlpComment, type YtDlpVideoInfo } from '../bridges';
import { CollaboratorError } from '../common/errors';
import { Comment, SourceVideo } from '../common/interfaces/pipeline.interface';
import { VideoSource } from './interfaces/collaborators.interface';
import { sourceListUrl, toCollaboratorError, watchUrl } from './ytdlp-failure';

/**
 * Top-level comments only; replies carry the id of their parent
 */
export function toComments(comments: readonly YtDlpComment[] | undefined): Comment[] {
  return (comments ?? [])
    .filter(c => c.parent === undefined || c.parent === 'root')
    .filter(c => typeof c.text === 'string' && typeof c.author === 'string')
    .map(c => ({
      author: c.author ?? '',
      text: c.text ?? '',
      postedAt: typeof c.timestamp === 'number' ? new Date(c.timestamp * 1000) : null,
    }));
}

function isListable(entry: YtDlpVideoInfo): boolean {
  return entry.live_status !== 'is_live' && entry.live_status !== 'is_upcoming';
}

@Injectable()
export class YtDlpVideoSource implements VideoSource {
  private readonly logger = new Logger(YtDlpVideoSource.name);

  constructor(private readonly ytdlp: YtDlpBridge) {}

  async listCandidateVideos(channelOrPlaylistId: string, limit: number): Promise<SourceVideo[]> {
    const url = sourceListUrl(channelOrPlaylistId);
    const entries = await this.dump(url, ['--flat-playlist', '--playlist-end', limit.toString()], channelOrPlaylistId);

    const videos: SourceVideo[] = [];
    for (const entry of entries.filter(isListable).slice(0, limit)) {
      let { title, duration } = entry;

      // Flat listings sometimes leave out the duration
      if (typeof duration !== 'number' || !title) {
        try {
          const [info] = await this.dump(watchUrl(entry.id), ['--no-playlist'], entry.id);
          title = title || info?.title;
          duration = typeof duration === 'number' ? duration : info?.duration;
        } catch (error) {
          if (error instanceof CollaboratorError && error.kind === 'NotFound') {
            this.logger.warn(`[${entry.id}] Listed but not available, leaving it out`);
            continue;
          }
          throw error;
        }
      }

      if (typeof duration !== 'number' || duration <= 0) {
        this.logger.warn(`[${entry.id}] No duration available, leaving it out`);
        continue;
      }

      videos.push({ id: entry.id, title: title || entry.id, durationSeconds: duration });
    }

    this.logger.log(`Found ${videos.length} candidate video(s) in ${channelOrPlaylistId}`);
    return videos;
  }

  async listComments(videoId: string): Promise<Comment[]> {
    const [info] = await this.dump(
      watchUrl(videoId),
      ['--skip-download', '--no-playlist', '--write-comments'],
      videoId,
    );

    const comments = toComments(info?.comments);
    this.logger.log(`[${videoId}] Fetched ${comments.length} comment(s)`);
    return comments;
  }

  private async dump(url: string, args: string[], subject: string): Promise<YtDlpVideoInfo[]> {
    try {
      return await this.ytdlp.dumpJson(url, args);
    } catch (error) {
      throw toCollaboratorError(error, subject);
    }
  }
}
