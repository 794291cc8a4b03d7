// src/collaborators/interfaces/collaborators.interface.ts
import { Comment, Compilation, SourceVideo, UploadDetails } from '../../common/interfaces/pipeline.interface';

export const VIDEO_SOURCE = Symbol('VIDEO_SOURCE');
export const MEDIA_DOWNLOADER = Symbol('MEDIA_DOWNLOADER');
export const PUBLISHER = Symbol('PUBLISHER');

/**
 * Lists source videos and their comments. Failures surface as
 * CollaboratorError (RateLimited, AuthFailure, NotFound).
 */
export interface VideoSource {
  listCandidateVideos(channelOrPlaylistId: string, limit: number): Promise<SourceVideo[]>;
  listComments(videoId: string): Promise<Comment[]>;
}

export interface MediaDownloader {
  /** Path of a complete media file for the video inside targetDir */
  download(videoId: string, targetDir: string): Promise<string>;
}

export interface Publisher {
  /** Returns a stable id for the published compilation */
  publish(compilation: Compilation, details: UploadDetails): Promise<string>;
  /** Id of an earlier upload carrying this title, if any */
  findExistingUpload(video: SourceVideo, title: string): Promise<string | null>;
}
