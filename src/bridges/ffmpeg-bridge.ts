/**
 * FFmpeg Bridge - Process wrapper for the FFmpeg binary
 * Each run is tracked by a process id so progress listeners can tell
 * concurrent encodes apart.
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import * as crypto from 'crypto';
import { Logger } from '@nestjs/common';

export interface FfmpegProgress {
  processId: string;
  percent: number;
  time: string;
  speed?: string;
  fps?: number;
}

export interface FfmpegResult {
  processId: string;
  success: boolean;
  exitCode: number | null;
  duration: number;
  error?: string;
  /** Last part of stderr, kept for diagnostics on failure */
  stderrTail?: string;
}

export interface FfmpegRunOptions {
  duration?: number;  // Total output duration in seconds for progress calculation
  processId?: string; // Custom process ID, auto-generated if not provided
}

export class FfmpegBridge extends EventEmitter {
  private readonly binaryPath: string;
  private readonly logger = new Logger(FfmpegBridge.name);

  constructor(ffmpegPath: string) {
    super();
    this.binaryPath = ffmpegPath;
    this.logger.log(`Initialized with binary: ${ffmpegPath}`);
  }

  /**
   * Run FFmpeg with given arguments.
   * Resolves with success=false on a non-zero exit; rejects only when the
   * binary cannot be started at all.
   */
  run(args: string[], options?: FfmpegRunOptions): Promise<FfmpegResult> {
    const processId = options?.processId || crypto.randomBytes(8).toString('hex');

    return new Promise((resolve, reject) => {
      this.logger.debug(`[${processId}] Starting: ffmpeg ${args.join(' ')}`);

      const proc = spawn(this.binaryPath, args);
      const startTime = Date.now();
      let stderrBuffer = '';

      proc.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderrBuffer = (stderrBuffer + text).slice(-4000);

        if (options?.duration) {
          const progress = parseProgress(text, processId, options.duration);
          if (progress) {
            this.emit('progress', progress);
          }
        }
      });

      proc.on('close', (code) => {
        const duration = Date.now() - startTime;

        if (code === 0) {
          this.logger.debug(`[${processId}] Completed successfully in ${duration}ms`);
          resolve({ processId, success: true, exitCode: code, duration });
          return;
        }

        const stderrTail = stderrBuffer.slice(-500);
        this.logger.error(`[${processId}] Failed with code ${code}`);
        this.logger.error(`[${processId}] stderr: ${stderrTail}`);
        resolve({
          processId,
          success: false,
          exitCode: code,
          duration,
          error: `FFmpeg exited with code ${code}`,
          stderrTail,
        });
      });

      proc.on('error', (err) => {
        this.logger.error(`[${processId}] Spawn error: ${err.message}`);

        if (err.message.includes('bad CPU type') || err.message.includes('ENOEXEC')) {
          reject(new Error(`FFmpeg binary has wrong architecture for this system (${process.arch})`));
        } else if (err.message.includes('ENOENT')) {
          reject(new Error(`FFmpeg binary not found at: ${this.binaryPath}`));
        } else {
          reject(err);
        }
      });
    });
  }
}

/**
 * Parse FFmpeg progress from stderr
 * FFmpeg outputs progress like: frame=  123 fps= 25 q=28.0 size=    1234kB time=00:00:05.12 bitrate= 1976.5kbits/s speed=1.02x
 */
export function parseProgress(text: string, processId: string, totalDuration: number): FfmpegProgress | null {
  const timeMatch = text.match(/time=(\d+):(\d+):(\d+)\.(\d+)/);
  if (!timeMatch) return null;

  const [timeStr, hours, minutes, seconds, centiseconds] = timeMatch;
  const currentTime = parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseInt(seconds, 10) + parseInt(centiseconds, 10) / 100;
  const percent = Math.min(Math.round((currentTime / totalDuration) * 100), 100);

  const progress: FfmpegProgress = {
    processId,
    percent,
    time: timeStr.slice('time='.length),
  };

  const speedMatch = text.match(/speed=\s*(\d+\.?\d*)x/);
  if (speedMatch) progress.speed = speedMatch[1];

  const fpsMatch = text.match(/fps=\s*(\d+)/);
  if (fpsMatch) progress.fps = parseInt(fpsMatch[1], 10);

  return progress;
}
