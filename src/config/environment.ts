// src/config/environment.ts

/**
 * Defaults applied when a variable is unset or empty.
 * CHANNEL_ID and TIMESTAMP_COMMENTERS have none and must be provided.
 */
export const environment = {
  maxCandidateVideos: 10,
  uploadPrivacy: 'private',
  videoNamePrefix: '[Compilation]',
  workDir: 'downloads',
  exportDir: 'exports',
  ledgerPath: 'data/processed_videos.db',
  duplicateDetection: false,
  notFoundTtlHours: 24,
  retryAttempts: 3,
  retryBackoffMs: 1000,
  keepDownloads: false,
  logLevel: 'info',
  logDir: 'logs',

  // Encode profile shared by clip extraction and assembly
  encoding: {
    videoCodec: 'libx264',
    audioCodec: 'aac',
    preset: 'medium',
    crf: 18,
    pixelFormat: 'yuv420p',
    // Fast input seek lands this many seconds before the clip start
    preSeekSeconds: 10,
  },
} as const;
