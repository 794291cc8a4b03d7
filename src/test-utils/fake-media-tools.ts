import * as fs from 'fs';
import * as path from 'path';
import { FfmpegBridge, FfprobeBridge, type FfmpegResult, type FfmpegRunOptions, type MediaInfo } from '../bridges';

interface FakeMedia {
  duration: number;
  hasAudio: boolean;
}

/**
 * ffprobe stand-in answering from an in-memory table instead of reading
 * the file.
 */
export class FakeFfprobe extends FfprobeBridge {
  readonly media = new Map<string, FakeMedia>();

  constructor() {
    super('ffprobe');
  }

  addMedia(filePath: string, duration: number, hasAudio = true): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, 'source media');
    this.media.set(filePath, { duration, hasAudio });
  }

  override async getMediaInfo(filePath: string): Promise<MediaInfo> {
    const entry = this.media.get(filePath);
    if (!entry) {
      throw new Error(`ffprobe exited with code 1: ${filePath}: No such file or directory`);
    }
    return { duration: entry.duration, hasVideo: true, hasAudio: entry.hasAudio, format: 'mov,mp4,m4a,3gp,3g2,mj2' };
  }
}

/**
 * ffmpeg stand-in. Writes a small file to the output path (the last
 * argument) and registers its duration with the fake probe: the `-t` value
 * for extractions, the sum of the inputs for concatenations.
 */
export class FakeFfmpeg extends FfmpegBridge {
  readonly calls: string[][] = [];
  /** Number of upcoming runs that exit non-zero after writing partial output */
  failures = 0;
  /** Called after each successful run */
  onRun?: (args: string[]) => void;

  constructor(private readonly probe: FakeFfprobe) {
    super('ffmpeg');
  }

  override async run(args: string[], options?: FfmpegRunOptions): Promise<FfmpegResult> {
    this.calls.push(args);
    const processId = options?.processId ?? 'fake';
    const output = args[args.length - 1];
    fs.writeFileSync(output, 'encoded media');

    if (this.failures > 0) {
      this.failures--;
      return { processId, success: false, exitCode: 1, duration: 1, error: 'FFmpeg exited with code 1', stderrTail: 'Conversion failed!' };
    }

    const inputs = args.flatMap((arg, i) => (arg === '-i' ? [args[i + 1]] : []));
    const tIndex = args.indexOf('-t');
    const duration = tIndex >= 0
      ? parseFloat(args[tIndex + 1])
      : inputs.reduce((sum, input) => sum + (this.probe.media.get(input)?.duration ?? 0), 0);
    const hasAudio = !args.includes('-an') && inputs.every(input => this.probe.media.get(input)?.hasAudio ?? false);

    this.probe.media.set(output, { duration, hasAudio });
    this.onRun?.(args);
    return { processId, success: true, exitCode: 0, duration: 1 };
  }
}
