/**
 * FFprobe Bridge - Process wrapper for FFprobe binary
 * Probes media files for duration and stream information
 */

import { spawn } from 'child_process';
import { Logger } from '@nestjs/common';

export interface StreamInfo {
  index: number;
  codec_name?: string;
  codec_type: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  width?: number;
  height?: number;
  duration?: string;
  r_frame_rate?: string;
}

export interface FormatInfo {
  filename: string;
  nb_streams: number;
  format_name: string;
  duration?: string;
  size?: string;
  bit_rate?: string;
}

export interface ProbeResult {
  streams: StreamInfo[];
  format: FormatInfo;
}

export interface MediaInfo {
  duration: number;         // Duration in seconds
  hasVideo: boolean;
  hasAudio: boolean;
  videoCodec?: string;
  audioCodec?: string;
  width?: number;
  height?: number;
  fps?: number;
  format: string;
}

export class FfprobeBridge {
  private readonly binaryPath: string;
  private readonly logger = new Logger(FfprobeBridge.name);

  constructor(ffprobePath: string) {
    this.binaryPath = ffprobePath;
    this.logger.log(`Initialized with binary: ${ffprobePath}`);
  }

  /**
   * Probe a media file and return raw JSON result
   */
  probe(filePath: string): Promise<ProbeResult> {
    return new Promise((resolve, reject) => {
      const args = [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        filePath,
      ];

      this.logger.debug(`Probing: ${filePath}`);

      const proc = spawn(this.binaryPath, args);
      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        if (code !== 0) {
          this.logger.error(`Failed with code ${code}: ${stderr}`);
          reject(new Error(`ffprobe exited with code ${code}: ${stderr}`));
          return;
        }

        try {
          resolve(parseProbeOutput(stdout));
        } catch (e) {
          this.logger.error(`Failed to parse output: ${e}`);
          reject(new Error(`Failed to parse ffprobe output: ${e}`));
        }
      });

      proc.on('error', (err) => {
        this.logger.error(`Spawn error: ${err.message}`);

        if (err.message.includes('bad CPU type') || err.message.includes('ENOEXEC')) {
          reject(new Error(`FFprobe binary has wrong architecture for this system (${process.arch})`));
        } else if (err.message.includes('ENOENT')) {
          reject(new Error(`FFprobe binary not found at: ${this.binaryPath}`));
        } else {
          reject(err);
        }
      });
    });
  }

  async getMediaInfo(filePath: string): Promise<MediaInfo> {
    return toMediaInfo(await this.probe(filePath));
  }

  /**
   * Get just the duration in seconds
   */
  async getDuration(filePath: string): Promise<number> {
    const info = await this.getMediaInfo(filePath);
    return info.duration;
  }

  async hasAudio(filePath: string): Promise<boolean> {
    const info = await this.getMediaInfo(filePath);
    return info.hasAudio;
  }
}

function parseProbeOutput(stdout: string): ProbeResult {
  const parsed: Partial<ProbeResult> = JSON.parse(stdout);
  if (!parsed.format) {
    throw new Error('missing format section');
  }
  return { streams: parsed.streams ?? [], format: parsed.format };
}

export function toMediaInfo(result: ProbeResult): MediaInfo {
  const videoStream = result.streams.find(s => s.codec_type === 'video');
  const audioStream = result.streams.find(s => s.codec_type === 'audio');

  // Parse duration from format or stream
  let duration = 0;
  if (result.format.duration) {
    duration = parseFloat(result.format.duration);
  } else if (videoStream?.duration) {
    duration = parseFloat(videoStream.duration);
  } else if (audioStream?.duration) {
    duration = parseFloat(audioStream.duration);
  }

  let fps: number | undefined;
  if (videoStream?.r_frame_rate) {
    const [num, den] = videoStream.r_frame_rate.split('/').map(Number);
    if (den && den > 0) {
      fps = Math.round((num / den) * 100) / 100;
    }
  }

  return {
    duration: Number.isFinite(duration) ? duration : 0,
    hasVideo: !!videoStream,
    hasAudio: !!audioStream,
    videoCodec: videoStream?.codec_name,
    audioCodec: audioStream?.codec_name,
    width: videoStream?.width,
    height: videoStream?.height,
    fps,
    format: result.format.format_name,
  };
}
