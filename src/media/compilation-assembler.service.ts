import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FfmpegBridge, FfprobeBridge } from '../bridges';
import { AssemblyError, errorMessage } from '../common/errors';
import { ClipFile, Compilation } from '../common/interfaces/pipeline.interface';
import { encodeArgs } from './encode-profile';

/**
 * concat filter graph over every input, e.g. for two clips with audio:
 * [0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[outv][outa]
 */
export function concatFilter(count: number, audio: boolean): string {
  const inputs = Array.from({ length: count }, (_, i) => (audio ? `[${i}:v][${i}:a]` : `[${i}:v]`)).join('');
  return audio
    ? `${inputs}concat=n=${count}:v=1:a=1[outv][outa]`
    : `${inputs}concat=n=${count}:v=1:a=0[outv]`;
}

/** Sibling path the encoder writes to before the final rename */
export function partialPath(outputPath: string): string {
  const ext = path.extname(outputPath) || '.mp4';
  const base = path.basename(outputPath, path.extname(outputPath));
  return path.join(path.dirname(outputPath), `.${base}.partial${ext}`);
}

@Injectable()
export class CompilationAssemblerService {
  private readonly logger = new Logger(CompilationAssemblerService.name);

  constructor(
    private readonly ffmpeg: FfmpegBridge,
    private readonly ffprobe: FfprobeBridge,
  ) {}

  /**
   * Concatenate clips in the order given into one file. On failure nothing
   * is left at outputPath or at its partial sibling.
   */
  async assemble(clipFiles: readonly ClipFile[], outputPath: string): Promise<Compilation> {
    if (clipFiles.length === 0) {
      throw new AssemblyError('NoClips', 'No clips to assemble');
    }

    const sourceVideoId = clipFiles[0].segment.sourceVideoId;
    const tempPath = partialPath(outputPath);

    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    try {
      const audioFlags = await Promise.all(clipFiles.map(clip => this.ffprobe.hasAudio(clip.path)));
      const audio = audioFlags.every(Boolean);
      if (!audio) {
        this.logger.warn(`[${sourceVideoId}] Some clips have no audio stream, assembling video only`);
      }

      const expectedDuration = clipFiles.reduce((sum, clip) => sum + clip.durationSeconds, 0);
      const args = [
        '-y',
        ...clipFiles.flatMap(clip => ['-i', clip.path]),
        '-filter_complex', concatFilter(clipFiles.length, audio),
        '-map', '[outv]',
        ...(audio ? ['-map', '[outa]'] : []),
        ...encodeArgs({ audio }),
        tempPath,
      ];

      this.logger.log(`[${sourceVideoId}] Assembling ${clipFiles.length} clip(s), ${expectedDuration.toFixed(2)}s expected`);

      const result = await this.ffmpeg.run(args, {
        duration: expectedDuration,
        processId: `assemble-${sourceVideoId}-${Date.now()}`,
      });
      if (!result.success) {
        throw new Error(result.error || `FFmpeg exited with code ${result.exitCode}`);
      }

      const stats = await fs.stat(tempPath);
      if (stats.size === 0) {
        throw new Error('encoder produced an empty file');
      }

      const durationSeconds = await this.ffprobe.getDuration(tempPath);
      await fs.rename(tempPath, outputPath);

      this.logger.log(`[${sourceVideoId}] Compilation written: ${outputPath} (${durationSeconds.toFixed(2)}s, ${(stats.size / 1024 / 1024).toFixed(2)} MB)`);

      return {
        path: outputPath,
        sourceVideoId,
        clips: [...clipFiles],
        durationSeconds,
        sizeBytes: stats.size,
      };
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new AssemblyError('EncodeFailure', `[${sourceVideoId}] Assembly failed: ${errorMessage(error)}`, error);
    }
  }
}
