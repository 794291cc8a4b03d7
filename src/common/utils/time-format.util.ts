// src/common/utils/time-format.util.ts

/**
 * Format seconds the way commenters write them: M:SS, or H:MM:SS past an hour
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.floor(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;

  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  }
  return `${m}:${s.toString().padStart(2, '0')}`;
}

export function formatRange(range: { start: number; end: number }): string {
  return `${formatTimestamp(range.start)}-${formatTimestamp(range.end)}`;
}
