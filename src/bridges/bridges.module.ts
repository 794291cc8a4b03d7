// src/bridges/bridges.module.ts
import { Module } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';
import { FfmpegBridge } from './ffmpeg-bridge';
import { FfprobeBridge } from './ffprobe-bridge';
import { YtDlpBridge, YtDlpConfig } from './ytdlp-bridge';
import { getRuntimePaths, RuntimePaths } from './runtime-paths';

export const RUNTIME_PATHS = Symbol('RUNTIME_PATHS');

export function toYtDlpConfig(paths: RuntimePaths, config: Pick<PipelineConfig, 'cookiesFile'>): YtDlpConfig {
  return {
    ffmpegPath: paths.ffmpeg,
    ...(config.cookiesFile ? { cookiesFile: config.cookiesFile } : {}),
  };
}

@Module({
  providers: [
    {
      provide: RUNTIME_PATHS,
      useFactory: (config: PipelineConfig): RuntimePaths => getRuntimePaths({
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
        ytdlpPath: config.ytdlpPath,
      }),
      inject: [PIPELINE_CONFIG],
    },
    {
      provide: FfmpegBridge,
      useFactory: (paths: RuntimePaths) => new FfmpegBridge(paths.ffmpeg),
      inject: [RUNTIME_PATHS],
    },
    {
      provide: FfprobeBridge,
      useFactory: (paths: RuntimePaths) => new FfprobeBridge(paths.ffprobe),
      inject: [RUNTIME_PATHS],
    },
    {
      provide: YtDlpBridge,
      useFactory: (paths: RuntimePaths, config: PipelineConfig) => new YtDlpBridge(paths.ytdlp, toYtDlpConfig(paths, config)),
      inject: [RUNTIME_PATHS, PIPELINE_CONFIG],
    },
  ],
  exports: [FfmpegBridge, FfprobeBridge, YtDlpBridge],
})
export class BridgesModule {}
