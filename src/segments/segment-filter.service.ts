// src/segments/segment-filter.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { KeywordRules, Segment, SourceVideo, TimeRange } from '../common/interfaces/pipeline.interface';
import { formatRange } from '../common/utils/time-format.util';

/** Ranges shorter than this after clamping are dropped */
export const MIN_SEGMENT_SECONDS = 1;

function normalizeKeywords(keywords: readonly string[]): string[] {
  return keywords.map(k => k.trim().toLowerCase()).filter(k => k.length > 0);
}

/**
 * Case-insensitive substring match: at least one keyword (any when there
 * are none) and no exclude keyword.
 */
export function matchesKeywords(description: string, rules: KeywordRules): boolean {
  const text = description.toLowerCase();
  const keywords = normalizeKeywords(rules.keywords);
  const excludes = normalizeKeywords(rules.excludeKeywords);

  if (keywords.length > 0 && !keywords.some(k => text.includes(k))) {
    return false;
  }
  return !excludes.some(k => text.includes(k));
}

@Injectable()
export class SegmentFilterService {
  private readonly logger = new Logger(SegmentFilterService.name);

  /**
   * Keep matching ranges, clamp them to the video, and order them by start.
   * Overlapping ranges stay separate segments.
   */
  filter(
    ranges: Iterable<TimeRange>,
    video: Pick<SourceVideo, 'id' | 'durationSeconds'>,
    rules: KeywordRules,
  ): Segment[] {
    const segments: Segment[] = [];

    for (const range of ranges) {
      if (!matchesKeywords(range.description, rules)) continue;

      if (range.start >= video.durationSeconds) {
        this.logger.log(`[${video.id}] Dropped ${formatRange(range)} "${range.description}": starts after the video ends`);
        continue;
      }

      const end = Math.min(range.end, video.durationSeconds);
      if (end - range.start < MIN_SEGMENT_SECONDS) {
        this.logger.log(`[${video.id}] Dropped ${formatRange(range)} "${range.description}": shorter than ${MIN_SEGMENT_SECONDS}s after clamping`);
        continue;
      }

      segments.push({
        sourceVideoId: video.id,
        start: range.start,
        end,
        description: range.description,
      });
    }

    // Array.prototype.sort is stable, so equal starts keep comment order
    return segments.sort((a, b) => a.start - b.start);
  }
}
