import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { YtDlpBridge, YtDlpError, type YtDlpProgress, type YtDlpResult } from '../bridges';
import { MediaDownloader } from './interfaces/collaborators.interface';
import { toCollaboratorError, watchUrl } from './ytdlp-failure';

// 720p mp4 is plenty for clips and keeps downloads small
export const DOWNLOAD_FORMAT = 'bv*[height<=720][ext=mp4]+ba[ext=m4a]/b[height<=720][ext=mp4]/b';
export const MEDIA_EXTENSIONS = ['mp4', 'mkv', 'webm'] as const;

@Injectable()
export class YtDlpMediaDownloader implements MediaDownloader {
  private readonly logger = new Logger(YtDlpMediaDownloader.name);

  constructor(private readonly ytdlp: YtDlpBridge) {}

  async download(videoId: string, targetDir: string): Promise<string> {
    await fs.mkdir(targetDir, { recursive: true });

    const existing = await this.findComplete(videoId, targetDir);
    if (existing) {
      this.logger.log(`[${videoId}] Reusing downloaded media: ${existing}`);
      return existing;
    }

    const processId = `download-${videoId}`;
    let lastLogged = -1;
    const progressHandler = (progress: YtDlpProgress) => {
      if (progress.processId !== processId) return;
      const step = Math.floor(progress.percent / 10);
      if (step === lastLogged) return;
      lastLogged = step;
      this.logger.verbose(`[${videoId}] ${progress.phase} ${progress.percent.toFixed(1)}%`);
    };
    this.ytdlp.on('progress', progressHandler);

    let result: YtDlpResult;
    try {
      result = await this.ytdlp.download(watchUrl(videoId), path.join(targetDir, `${videoId}.%(ext)s`), {
        format: DOWNLOAD_FORMAT,
        mergeOutputFormat: 'mp4',
        processId,
      });
    } finally {
      this.ytdlp.off('progress', progressHandler);
    }

    if (!result.success) {
      throw toCollaboratorError(
        new YtDlpError(result.error ?? `yt-dlp exited with code ${result.exitCode}`, result.exitCode, result.stderr),
        videoId,
      );
    }

    const downloaded = await this.findComplete(videoId, targetDir);
    if (!downloaded) {
      throw new Error(`[${videoId}] yt-dlp finished but no media file was written to ${targetDir}`);
    }

    this.logger.log(`[${videoId}] Downloaded ${path.basename(downloaded)}`);
    return downloaded;
  }

  private async findComplete(videoId: string, targetDir: string): Promise<string | null> {
    for (const ext of MEDIA_EXTENSIONS) {
      const candidate = path.join(targetDir, `${videoId}.${ext}`);
      try {
        const stats = await fs.stat(candidate);
        if (stats.isFile() && stats.size > 0) {
          return candidate;
        }
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw err;
        }
      }
    }
    return null;
  }
}
