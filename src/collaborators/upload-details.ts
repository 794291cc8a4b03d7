// src/collaborators/upload-details.ts
import { Compilation, PrivacyStatus, SourceVideo, UploadDetails } from '../common/interfaces/pipeline.interface';
import { formatRange } from '../common/utils/time-format.util';

export const MAX_TITLE_LENGTH = 100;

export interface UploadDetailsOptions {
  prefix: string;
  tags: readonly string[];
  privacy: PrivacyStatus;
}

/**
 * "<prefix> <source title>", cut to the platform's 100 character limit
 */
export function compilationTitle(prefix: string, sourceTitle: string): string {
  const title = [prefix.trim(), sourceTitle.trim()].filter(Boolean).join(' ');
  if (title.length <= MAX_TITLE_LENGTH) {
    return title;
  }
  return `${title.slice(0, MAX_TITLE_LENGTH - 3).trimEnd()}...`;
}

export function uniqueTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    const key = trimmed.toLowerCase();
    if (trimmed && !seen.has(key)) {
      seen.add(key);
      result.push(trimmed);
    }
  }
  return result;
}

export function buildUploadDetails(
  video: SourceVideo,
  compilation: Compilation,
  options: UploadDetailsOptions,
): UploadDetails {
  const lines = [
    `Clips from: ${video.title}`,
    `https://youtu.be/${video.id}`,
    '',
    'Segments:',
    ...compilation.clips.map(clip => {
      const label = clip.segment.description ? ` ${clip.segment.description}` : '';
      return `${formatRange(clip.segment)}${label}`;
    }),
  ];

  return {
    title: compilationTitle(options.prefix, video.title),
    description: lines.join('\n'),
    tags: uniqueTags(options.tags),
    privacy: options.privacy,
  };
}
