// src/common/interfaces/pipeline.interface.ts

/**
 * A span of a source video in seconds, as written by a commenter.
 * Invariant: 0 <= start < end.
 */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
  readonly description: string;
}

export interface Comment {
  author: string;
  text: string;
  postedAt: Date | null;
}

export interface SourceVideo {
  id: string;
  title: string;
  durationSeconds: number;
}

/**
 * A TimeRange that passed keyword filtering and was clamped to the
 * duration of the video it belongs to.
 */
export interface Segment extends TimeRange {
  readonly sourceVideoId: string;
}

export interface ClipFile {
  path: string;
  segment: Segment;
  durationSeconds: number;
}

export interface Compilation {
  path: string;
  sourceVideoId: string;
  clips: ClipFile[];
  durationSeconds: number;
  sizeBytes: number;
}

export interface ProcessingRecord {
  sourceVideoId: string;
  processedAt: string;
  outputVideoId: string | null;
}

export interface SkipEntry {
  sourceVideoId: string;
  reason: string;
  skippedUntil: string;
}

export interface KeywordRules {
  keywords: readonly string[];
  excludeKeywords: readonly string[];
}

export type PrivacyStatus = 'private' | 'unlisted' | 'public';

export interface UploadDetails {
  title: string;
  description: string;
  tags: string[];
  privacy: PrivacyStatus;
}

export type VideoOutcome = 'processed' | 'skipped' | 'failed';

export interface PassSummary {
  candidates: number;
  processed: string[];
  skipped: string[];
  failed: string[];
  cancelled: boolean;
}
