// src/pipeline/pipeline-events.ts

export const PIPELINE_EVENTS = {
  VIDEO_PROCESSED: 'pipeline.video.processed',
  VIDEO_SKIPPED: 'pipeline.video.skipped',
  VIDEO_FAILED: 'pipeline.video.failed',
} as const;

export type SkipReason =
  | 'already-processed'
  | 'skip-listed'
  | 'duplicate'
  | 'not-found'
  | 'no-segments'
  | 'no-clips';

export interface VideoProcessedEvent {
  videoId: string;
  outputVideoId: string;
  clips: number;
  durationSeconds: number;
}

export interface VideoSkippedEvent {
  videoId: string;
  reason: SkipReason;
}

export interface VideoFailedEvent {
  videoId: string;
  error: string;
  kind?: string;
}
