/**
 * Bridges - Process wrappers for external binaries
 *
 * Provides clean interfaces to ffmpeg, ffprobe and yt-dlp. Instances are
 * created once by BridgesModule from the validated configuration and
 * injected by class.
 */

export {
  getRuntimePaths,
  getPlatformFolder,
  getBinaryExtension,
  type RuntimePaths,
  type RuntimePathOverrides,
} from './runtime-paths';

export {
  FfmpegBridge,
  parseProgress,
  type FfmpegProgress,
  type FfmpegResult,
  type FfmpegRunOptions,
} from './ffmpeg-bridge';

export {
  FfprobeBridge,
  toMediaInfo,
  type StreamInfo,
  type FormatInfo,
  type ProbeResult,
  type MediaInfo,
} from './ffprobe-bridge';

export {
  YtDlpBridge,
  YtDlpError,
  commonArgs,
  parseDownloadProgress,
  type YtDlpProgress,
  type YtDlpResult,
  type YtDlpVideoInfo,
  type YtDlpComment,
  type YtDlpConfig,
} from './ytdlp-bridge';

export { BridgesModule, toYtDlpConfig } from './bridges.module';
