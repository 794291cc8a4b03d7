// src/segments/timestamp-parser.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { Comment, TimeRange } from '../common/interfaces/pipeline.interface';
import { parseTimestamps, scanTimestamps } from './parsers/timestamp-parser';

export interface ParsedComments {
  ranges: TimeRange[];
  /** Comments written by an allowed author */
  eligibleComments: number;
  /** Timestamp lines that could not be used (ParseSkip) */
  skipped: number;
}

/** "@Alice " and "alice" name the same author */
export function normalizeAuthor(author: string): string {
  return author.trim().replace(/^@/, '').toLowerCase();
}

@Injectable()
export class TimestampParserService {
  private readonly logger = new Logger(TimestampParserService.name);

  parse(text: string): Iterable<TimeRange> {
    return parseTimestamps(text);
  }

  /**
   * Ranges from every comment by an allowed author, in comment order
   */
  parseComments(comments: Iterable<Comment>, allowedAuthors: Iterable<string>): ParsedComments {
    const allowed = new Set(Array.from(allowedAuthors, normalizeAuthor));
    const ranges: TimeRange[] = [];
    let eligibleComments = 0;
    let skipped = 0;

    for (const comment of comments) {
      if (!allowed.has(normalizeAuthor(comment.author))) continue;
      eligibleComments++;

      for (const event of scanTimestamps(comment.text)) {
        if (event.type === 'range') {
          ranges.push(event.range);
        } else {
          skipped++;
          this.logger.debug(`Skipped line from ${comment.author}: ${event.reason} (${event.line})`);
        }
      }
    }

    if (skipped > 0) {
      this.logger.log(`Skipped ${skipped} unusable timestamp line(s) in ${eligibleComments} comment(s)`);
    }

    return { ranges, eligibleComments, skipped };
  }
}
