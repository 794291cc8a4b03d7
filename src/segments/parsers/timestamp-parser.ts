// src/segments/parsers/timestamp-parser.ts
import { TimeRange } from '../../common/interfaces/pipeline.interface';

/**
 * One parsed line. `skip` marks a line that looked like a timestamp but
 * could not be used; the caller counts these.
 */
export type ParseEvent =
  | { type: 'range'; range: TimeRange }
  | { type: 'skip'; line: string; reason: string };

type LineToken =
  | { kind: 'single'; seconds: number; text: string }
  | { kind: 'pair'; start: number; end: number; text: string }
  | { kind: 'malformed'; reason: string };

// Bullets and punctuation allowed before the first token
const LEADING = String.raw`^[\s\-*•·>#(\[]*`;
// Starts with a digit; parts may hold letters so malformed tokens are still caught
const TOKEN = String.raw`(\d{1,2}(?::[0-9a-z]{1,3}){1,2})`;
const BOUNDARY = String.raw`(?=$|[\s)\]\-–—~,.:;|])`;
const RANGE_SEPARATOR = String.raw`\s*(?:-|–|—|~|\bto\b)\s*`;

const PAIR_LINE = new RegExp(`${LEADING}${TOKEN}${BOUNDARY}${RANGE_SEPARATOR}${TOKEN}${BOUNDARY}(.*)$`, 'i');
const SINGLE_LINE = new RegExp(`${LEADING}${TOKEN}${BOUNDARY}(.*)$`, 'i');

/**
 * Comments arrive as HTML: <br> line breaks, anchor-wrapped timestamps and
 * escaped entities. Reduce them to plain lines.
 */
export function normalizeCommentText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/<br\s*\/?>/gi, '\n') // Line breaks
    .replace(/<a\b[^>]*>([\s\S]*?)<\/a>/gi, '$1') // Keep link text only
    .replace(/<[^>]+>/g, '') // Remove remaining tags
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Parse timestamp in H:MM:SS, MM:SS or M:SS format to seconds.
 * Returns null for non-numeric parts or minutes/seconds of 60 and above.
 */
export function parseTimestampToSeconds(timestamp: string): number | null {
  const parts = timestamp.trim().split(':');

  if (parts.length === 2) {
    // MM:SS format
    const [minutes, seconds] = parts;
    if (!/^\d{1,2}$/.test(minutes) || !/^\d{2}$/.test(seconds)) return null;
    const m = parseInt(minutes, 10);
    const s = parseInt(seconds, 10);
    if (m >= 60 || s >= 60) return null;
    return m * 60 + s;
  } else if (parts.length === 3) {
    // H:MM:SS format
    const [hours, minutes, seconds] = parts;
    if (!/^\d{1,2}$/.test(hours) || !/^\d{2}$/.test(minutes) || !/^\d{2}$/.test(seconds)) return null;
    const h = parseInt(hours, 10);
    const m = parseInt(minutes, 10);
    const s = parseInt(seconds, 10);
    if (m >= 60 || s >= 60) return null;
    return h * 3600 + m * 60 + s;
  }

  return null;
}

function cleanDescription(text: string): string {
  return text.replace(/^[\s\-–—:|)\].]+/, '').trim();
}

function joinDescriptions(first: string, second: string): string {
  return [first, second].filter(part => part.length > 0).join(' / ');
}

function readLine(line: string): LineToken | null {
  const pairMatch = line.match(PAIR_LINE);
  if (pairMatch) {
    const [, startToken, endToken, rest] = pairMatch;
    const start = parseTimestampToSeconds(startToken);
    const end = parseTimestampToSeconds(endToken);
    if (start === null || end === null) {
      return { kind: 'malformed', reason: `invalid timestamp in "${startToken} - ${endToken}"` };
    }
    return { kind: 'pair', start, end, text: cleanDescription(rest) };
  }

  const singleMatch = line.match(SINGLE_LINE);
  if (singleMatch) {
    const [, token, rest] = singleMatch;
    const seconds = parseTimestampToSeconds(token);
    if (seconds === null) {
      return { kind: 'malformed', reason: `invalid timestamp "${token}"` };
    }
    return { kind: 'single', seconds, text: cleanDescription(rest) };
  }

  return null;
}

/**
 * Walk a comment line by line.
 *
 * Lines holding one timestamp are paired in order (1st with 2nd, 3rd with
 * 4th, ...); lines without a timestamp do not break a pair. A line with an
 * explicit `START - END` is a range by itself and discards an open start.
 * A trailing unpaired start yields nothing.
 */
export function* scanTimestamps(text: string): Generator<ParseEvent> {
  let pending: { seconds: number; text: string } | null = null;

  for (const rawLine of normalizeCommentText(text).split('\n')) {
    const line = rawLine.trim();
    if (line.length === 0) continue;

    const token = readLine(line);
    if (token === null) continue;

    if (token.kind === 'malformed') {
      yield { type: 'skip', line, reason: token.reason };
      continue;
    }

    if (token.kind === 'pair') {
      pending = null;
      if (token.end > token.start) {
        yield { type: 'range', range: { start: token.start, end: token.end, description: token.text } };
      } else {
        yield { type: 'skip', line, reason: 'range end is not after its start' };
      }
      continue;
    }

    if (pending === null) {
      pending = { seconds: token.seconds, text: token.text };
      continue;
    }

    if (token.seconds > pending.seconds) {
      yield {
        type: 'range',
        range: {
          start: pending.seconds,
          end: token.seconds,
          description: joinDescriptions(pending.text, token.text),
        },
      };
      pending = null;
    } else {
      yield { type: 'skip', line, reason: 'range end is not after its start' };
      pending = { seconds: token.seconds, text: token.text };
    }
  }
}

/**
 * Ranges found in a comment. The result is lazy and can be iterated any
 * number of times; each iteration parses the text afresh.
 */
export function parseTimestamps(text: string): Iterable<TimeRange> {
  return {
    *[Symbol.iterator]() {
      for (const event of scanTimestamps(text)) {
        if (event.type === 'range') {
          yield event.range;
        }
      }
    },
  };
}
