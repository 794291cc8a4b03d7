/**
 * Runtime path resolution for media binaries
 * Central source of truth for ffmpeg, ffprobe and yt-dlp locations
 */

import * as path from 'path';
import * as fs from 'fs';

/**
 * Get platform folder used by the @ffmpeg-installer / @ffprobe-installer packages
 */
export function getPlatformFolder(): string {
  const platform = process.platform;
  const arch = process.arch;

  if (platform === 'win32') {
    return 'win32-x64';
  } else if (platform === 'darwin') {
    return arch === 'arm64' ? 'darwin-arm64' : 'darwin-x64';
  }
  return arch === 'arm64' ? 'linux-arm64' : 'linux-x64';
}

/**
 * Get platform-specific binary extension
 */
export function getBinaryExtension(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export interface RuntimePaths {
  ffmpeg: string;
  ffprobe: string;
  ytdlp: string;
}

export interface RuntimePathOverrides {
  ffmpegPath?: string;
  ffprobePath?: string;
  ytdlpPath?: string;
}

/**
 * Resolve binary paths. Explicit overrides win, then the binaries shipped in
 * node_modules by the installer packages, then the bare command name so the
 * system PATH is searched.
 */
export function getRuntimePaths(overrides: RuntimePathOverrides = {}, projectRoot: string = process.cwd()): RuntimePaths {
  const platformFolder = getPlatformFolder();
  const ext = getBinaryExtension();

  const bundledFfmpeg = path.join(projectRoot, 'node_modules', '@ffmpeg-installer', platformFolder, `ffmpeg${ext}`);
  const bundledFfprobe = path.join(projectRoot, 'node_modules', '@ffprobe-installer', platformFolder, `ffprobe${ext}`);

  return {
    ffmpeg: overrides.ffmpegPath || firstExisting([bundledFfmpeg]) || `ffmpeg${ext}`,
    ffprobe: overrides.ffprobePath || firstExisting([bundledFfprobe]) || `ffprobe${ext}`,
    ytdlp: overrides.ytdlpPath || `yt-dlp${ext}`,
  };
}

function firstExisting(candidates: string[]): string | undefined {
  return candidates.find(candidate => fs.existsSync(candidate));
}
