/**
 * Work directory layout for one source video
 *
 *   <workRoot>/<videoId>/<videoId>.mp4                 downloaded source
 *   <workRoot>/<videoId>/parts/<clip>.mp4              one file per segment
 *   <workRoot>/<videoId>/compilation_<videoId>.mp4     assembled output
 *
 * Every path is derived from its inputs only, so a re-run writes to the
 * same files instead of leaving duplicates behind.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { Segment } from '../interfaces/pipeline.interface';

const logger = new Logger('WorkDirUtil');

export function videoWorkDir(workRoot: string, videoId: string): string {
  return path.join(workRoot, videoId);
}

export function clipsDir(workRoot: string, videoId: string): string {
  return path.join(videoWorkDir(workRoot, videoId), 'parts');
}

/**
 * Seconds as 02m05s, with a millisecond suffix when the value is fractional
 */
export function formatClipTime(seconds: number): string {
  const totalMillis = Math.round(seconds * 1000);
  const whole = Math.floor(totalMillis / 1000);
  const millis = totalMillis % 1000;
  const minutes = Math.floor(whole / 60);
  const secs = whole % 60;
  const base = `${minutes.toString().padStart(2, '0')}m${secs.toString().padStart(2, '0')}s`;
  return millis > 0 ? `${base}${millis}ms` : base;
}

export function safeDescription(description: string, maxLength = 30): string {
  return Array.from(description.slice(0, maxLength))
    .map(c => (/[\p{L}\p{N}]/u.test(c) ? c : '_'))
    .join('');
}

export function clipPath(workRoot: string, segment: Segment): string {
  const times = `${formatClipTime(segment.start)}_to_${formatClipTime(segment.end)}`;
  const desc = safeDescription(segment.description);
  const filename = desc
    ? `${segment.sourceVideoId}_${times}_${desc}.mp4`
    : `${segment.sourceVideoId}_${times}.mp4`;
  return path.join(clipsDir(workRoot, segment.sourceVideoId), filename);
}

export function compilationPath(workRoot: string, videoId: string): string {
  return path.join(videoWorkDir(workRoot, videoId), `compilation_${videoId}.mp4`);
}

/**
 * Remove each file on its own; a missing file counts as removed.
 * Returns the paths that could not be removed.
 */
export async function removeFiles(paths: Iterable<string>): Promise<string[]> {
  const failed: string[] = [];

  for (const filePath of new Set(paths)) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (err) {
      logger.warn(`Could not remove ${filePath}: ${(err as Error).message}`);
      failed.push(filePath);
    }
  }

  return failed;
}

/**
 * Remove a directory only when nothing is left in it
 */
export async function removeDirIfEmpty(dirPath: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(dirPath);
    if (entries.length > 0) {
      return false;
    }
    await fs.rmdir(dirPath);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return true;
    }
    logger.warn(`Could not remove directory ${dirPath}: ${(err as Error).message}`);
    return false;
  }
}
