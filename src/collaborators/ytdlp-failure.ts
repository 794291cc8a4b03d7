// src/collaborators/ytdlp-failure.ts
import { YtDlpError } from '../bridges';
import { CollaboratorError } from '../common/errors';

const RATE_LIMITED = /HTTP Error 429|Too Many Requests|rate[- ]?limit/i;
// Our own access is refused: every further request would fail the same way
const AUTH_FAILURE = /confirm you(?:'|’)?re not a bot|login required|cookies are no longer valid|HTTP Error 40[13]/i;
// This one video cannot be reached; later ones may still be
const NOT_FOUND = /Video unavailable|has been removed|no longer available|does not exist|HTTP Error 404|Private video|This video is private|members-only|Join this channel|confirm your age|age-restricted/i;

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Listing URL for a channel id, @handle, playlist id or full URL
 */
export function sourceListUrl(channelOrPlaylistId: string): string {
  const id = channelOrPlaylistId.trim();
  if (/^https?:\/\//i.test(id)) return id;
  if (id.startsWith('@')) return `https://www.youtube.com/${id}/videos`;
  if (/^(PL|UU|LL|FL|OL)[\w-]+$/.test(id)) return `https://www.youtube.com/playlist?list=${id}`;
  return `https://www.youtube.com/channel/${id}/videos`;
}

/**
 * Map yt-dlp's stderr to a collaborator error kind. Returns null when the
 * failure matches none of them.
 */
export function classifyYtDlpFailure(stderr: string, subject: string): CollaboratorError | null {
  const lastError = stderr
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith('ERROR:'))
    .pop() ?? stderr.trim().split('\n').pop() ?? '';

  if (RATE_LIMITED.test(stderr)) {
    return new CollaboratorError('RateLimited', `${subject}: rate limited (${lastError})`);
  }
  if (NOT_FOUND.test(stderr)) {
    return new CollaboratorError('NotFound', `${subject}: not found (${lastError})`);
  }
  if (AUTH_FAILURE.test(stderr)) {
    return new CollaboratorError('AuthFailure', `${subject}: authentication required (${lastError})`);
  }
  return null;
}

/**
 * Rethrow a yt-dlp failure as a CollaboratorError where it can be
 * classified; other errors pass through untouched.
 */
export function toCollaboratorError(error: unknown, subject: string): unknown {
  if (error instanceof YtDlpError) {
    const classified = classifyYtDlpFailure(error.stderr, subject);
    if (classified) {
      return new CollaboratorError(classified.kind, classified.message, error);
    }
  }
  return error;
}
