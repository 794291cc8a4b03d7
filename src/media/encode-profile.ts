// src/media/encode-profile.ts
import { environment } from '../config/environment';

/**
 * Output codec arguments shared by clip extraction and assembly.
 * H.264 at CRF 18 with AAC audio; never a stream copy, so cuts land on
 * the requested frame rather than the nearest keyframe.
 */
export function encodeArgs(options: { audio: boolean } = { audio: true }): string[] {
  const { encoding } = environment;
  const args = [
    '-c:v', encoding.videoCodec,
    '-preset', encoding.preset,
    '-crf', encoding.crf.toString(),
    '-pix_fmt', encoding.pixelFormat,
  ];

  if (options.audio) {
    args.push('-c:a', encoding.audioCodec);
  } else {
    args.push('-an');
  }

  args.push('-movflags', '+faststart');
  return args;
}

/**
 * Seek arguments for [start, start + duration): a fast input seek to a
 * little before the start, then an accurate output seek for the rest.
 */
export function seekArgs(inputPath: string, start: number, duration: number): string[] {
  const seekBuffer = Math.max(0, start - environment.encoding.preSeekSeconds);
  const args: string[] = [];

  if (seekBuffer > 0) {
    args.push('-ss', seekBuffer.toString());
  }

  args.push('-i', inputPath);
  args.push(
    '-ss', (start - seekBuffer).toString(),
    '-t', duration.toString(),
  );
  return args;
}
