/**
 * YT-DLP Bridge - Process wrapper for yt-dlp binary
 * Lists channel/playlist entries, reads video metadata and comments, and
 * downloads media with progress tracking
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import * as crypto from 'crypto';
import * as readline from 'readline';
import { Logger } from '@nestjs/common';

export interface YtDlpProgress {
  processId: string;
  percent: number;
  totalSize: number;
  downloadedBytes: number;
  downloadSpeed: number;
  eta: number;
  phase: 'download' | 'postprocess' | 'complete';
}

export interface YtDlpResult {
  processId: string;
  success: boolean;
  exitCode: number | null;
  duration: number;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface YtDlpComment {
  id?: string;
  author?: string;
  author_id?: string;
  text?: string;
  timestamp?: number;
  parent?: string;
}

export interface YtDlpVideoInfo {
  id: string;
  title?: string;
  duration?: number;
  webpage_url?: string;
  url?: string;
  availability?: string;
  live_status?: string;
  comments?: YtDlpComment[];
}

export interface YtDlpConfig {
  ffmpegPath?: string;  // Path to FFmpeg for post-processing
  cookiesFile?: string;
}

/**
 * A yt-dlp process that exited non-zero. Carries stderr so callers can
 * classify the failure.
 */
export class YtDlpError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(message);
    this.name = 'YtDlpError';
  }
}

/**
 * Arguments every invocation shares: the ffmpeg used for merging and the
 * cookies file, when configured.
 */
export function commonArgs(config: YtDlpConfig): string[] {
  const args: string[] = [];
  if (config.ffmpegPath) {
    args.push('--ffmpeg-location', config.ffmpegPath);
  }
  if (config.cookiesFile) {
    args.push('--cookies', config.cookiesFile);
  }
  return args;
}

/**
 * Parse progress from yt-dlp output
 */
export function parseDownloadProgress(line: string, processId: string): YtDlpProgress | null {
  // Progress template format: bytes/total speed eta time [percent%]
  const templateMatch = line.match(/(\d+)\/(\d+)\s+([\d.]+)\s+eta\s+(\S+)\s+\[\s*([\d.]+)%\]/);
  if (templateMatch) {
    const [, downloaded, total, speed, eta, percent] = templateMatch;
    return {
      processId,
      percent: parseFloat(percent),
      totalSize: parseInt(total, 10),
      downloadedBytes: parseInt(downloaded, 10),
      downloadSpeed: parseFloat(speed),
      eta: eta !== 'NA' ? parseFloat(eta) : 0,
      phase: 'download',
    };
  }

  // Post-processing indicators
  if (line.includes('[Merger]') || line.includes('[ffmpeg]')) {
    return { processId, percent: 95, totalSize: 0, downloadedBytes: 0, downloadSpeed: 0, eta: 0, phase: 'postprocess' };
  }

  return null;
}

export class YtDlpBridge extends EventEmitter {
  private readonly binaryPath: string;
  private readonly config: YtDlpConfig;
  private readonly logger = new Logger(YtDlpBridge.name);

  constructor(ytdlpPath: string, config: YtDlpConfig = {}) {
    super();
    this.binaryPath = ytdlpPath;
    this.config = config;
    this.logger.log(`Initialized with binary: ${ytdlpPath}`);
  }

  /**
   * Download a video
   */
  async download(
    url: string,
    outputTemplate: string,
    options?: {
      format?: string;
      processId?: string;
      mergeOutputFormat?: string;
    },
  ): Promise<YtDlpResult> {
    const processId = options?.processId || crypto.randomBytes(8).toString('hex');
    const args: string[] = [];

    args.push('-o', outputTemplate);

    // Progress template for parsing
    args.push('--progress-template', '%(progress.downloaded_bytes)s/%(progress.total_bytes)s %(progress.speed)s eta %(progress.eta)s [%(progress._percent_str)s]');

    if (options?.format) {
      args.push('-f', options.format);
    }

    if (options?.mergeOutputFormat) {
      args.push('--merge-output-format', options.mergeOutputFormat);
    }

    args.push(...commonArgs(this.config));
    args.push('--no-playlist', '--force-overwrites');
    args.push(url);

    this.logger.log(`[${processId}] Starting download: ${url}`);

    const result = await this.spawnProcess(args, processId, line => {
      const progress = parseDownloadProgress(line, processId);
      if (progress) {
        this.emit('progress', progress);
      }
    });

    if (result.success) {
      this.emit('progress', {
        processId,
        percent: 100,
        totalSize: 0,
        downloadedBytes: 0,
        downloadSpeed: 0,
        eta: 0,
        phase: 'complete',
      } satisfies YtDlpProgress);
    }

    return result;
  }

  /**
   * Run yt-dlp in --dump-json mode and parse every JSON line of stdout.
   * Flat playlist listings print one object per entry.
   */
  async dumpJson(url: string, extraArgs: string[] = []): Promise<YtDlpVideoInfo[]> {
    const processId = crypto.randomBytes(8).toString('hex');
    const args = ['--dump-json', ...commonArgs(this.config), ...extraArgs, url];

    this.logger.debug(`[${processId}] Reading metadata: ${url}`);

    const result = await this.spawnProcess(args, processId);
    if (!result.success) {
      throw new YtDlpError(result.error ?? `yt-dlp exited with code ${result.exitCode}`, result.exitCode, result.stderr);
    }

    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.startsWith('{'))
      .map(line => {
        try {
          const info: YtDlpVideoInfo = JSON.parse(line);
          return info;
        } catch (e) {
          throw new YtDlpError(`Failed to parse yt-dlp output: ${e}`, result.exitCode, result.stderr);
        }
      });
  }

  private spawnProcess(args: string[], processId: string, onLine?: (line: string) => void): Promise<YtDlpResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.binaryPath, args);
      const startTime = Date.now();

      let stdoutBuffer = '';
      let stderrBuffer = '';

      proc.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stdoutBuffer += chunk;

        if (onLine) {
          for (const line of chunk.split('\n')) {
            if (line.trim()) {
              onLine(line);
            }
          }
        }
      });

      // Process stderr line by line for real-time progress
      if (proc.stderr) {
        const stderrReader = readline.createInterface({
          input: proc.stderr,
          terminal: false,
        });

        stderrReader.on('line', (line) => {
          stderrBuffer += line + '\n';
          onLine?.(line);
        });
      }

      proc.on('close', (code) => {
        const duration = Date.now() - startTime;

        if (code === 0) {
          this.logger.debug(`[${processId}] Completed successfully in ${duration}ms`);
          resolve({ processId, success: true, exitCode: code, duration, stdout: stdoutBuffer, stderr: stderrBuffer });
          return;
        }

        this.logger.error(`[${processId}] Failed with code ${code}`);
        this.logger.error(`[${processId}] stderr: ${stderrBuffer.slice(-500)}`);
        resolve({
          processId,
          success: false,
          exitCode: code,
          duration,
          stdout: stdoutBuffer,
          stderr: stderrBuffer,
          error: `yt-dlp exited with code ${code}`,
        });
      });

      proc.on('error', (err) => {
        this.logger.error(`[${processId}] Spawn error: ${err.message}`);

        if (err.message.includes('bad CPU type') || err.message.includes('ENOEXEC')) {
          reject(new Error(`yt-dlp binary has wrong architecture for this system (${process.arch})`));
        } else if (err.message.includes('ENOENT')) {
          reject(new Error(`yt-dlp binary not found at: ${this.binaryPath}`));
        } else {
          reject(err);
        }
      });
    });
  }
}
