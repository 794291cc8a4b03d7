import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FfmpegBridge, FfprobeBridge, type FfmpegProgress } from '../bridges';
import { ClipError, errorMessage } from '../common/errors';
import { ClipFile, Segment } from '../common/interfaces/pipeline.interface';
import { clipPath } from '../common/utils/work-dir.util';
import { formatRange } from '../common/utils/time-format.util';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';
import { encodeArgs, seekArgs } from './encode-profile';

@Injectable()
export class ClipExtractorService {
  private readonly logger = new Logger(ClipExtractorService.name);

  constructor(
    private readonly ffmpeg: FfmpegBridge,
    private readonly ffprobe: FfprobeBridge,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Re-encode one segment of a local media file into its own clip.
   * The output path defaults to the segment's deterministic path under the
   * work directory, so a re-run overwrites the same file.
   */
  async extract(
    sourceMediaPath: string,
    segment: Segment,
    outputPath: string = clipPath(this.config.workDir, segment),
  ): Promise<ClipFile> {
    const label = `[${segment.sourceVideoId}] ${formatRange(segment)}`;

    let actualDuration: number;
    try {
      actualDuration = await this.ffprobe.getDuration(sourceMediaPath);
    } catch (error) {
      throw new ClipError('EncodeFailure', segment, `${label}: could not probe source: ${errorMessage(error)}`, error);
    }

    if (segment.start >= actualDuration) {
      throw new ClipError(
        'OutOfRange',
        segment,
        `${label}: start ${segment.start}s is beyond the media duration ${actualDuration.toFixed(2)}s`,
      );
    }

    const end = Math.min(segment.end, actualDuration);
    const duration = end - segment.start;
    if (duration <= 0) {
      throw new ClipError('EmptyRange', segment, `${label}: nothing left after clamping to ${actualDuration.toFixed(2)}s`);
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    const args = ['-y', ...seekArgs(sourceMediaPath, segment.start, duration), ...encodeArgs(), '-avoid_negative_ts', 'make_zero', outputPath];
    const processId = `clip-extract-${segment.sourceVideoId}-${Date.now()}`;

    const progressHandler = (progress: FfmpegProgress) => {
      if (progress.processId !== processId) return;
      this.logger.verbose(`${label} progress: ${progress.percent}%`);
    };
    this.ffmpeg.on('progress', progressHandler);

    let clipDuration: number;
    try {
      const result = await this.ffmpeg.run(args, { duration, processId });
      if (!result.success) {
        throw new Error(result.error || `FFmpeg exited with code ${result.exitCode}`);
      }

      const stats = await fs.stat(outputPath);
      if (stats.size === 0) {
        throw new Error('encoder produced an empty file');
      }

      clipDuration = await this.ffprobe.getDuration(outputPath);
    } catch (error) {
      await fs.rm(outputPath, { force: true });
      throw new ClipError('EncodeFailure', segment, `${label}: encoding failed: ${errorMessage(error)}`, error);
    } finally {
      this.ffmpeg.off('progress', progressHandler);
    }

    this.logger.log(`${label} extracted to ${path.basename(outputPath)} (${clipDuration.toFixed(2)}s)`);

    return {
      path: outputPath,
      segment: { ...segment, end },
      durationSeconds: clipDuration,
    };
  }
}
