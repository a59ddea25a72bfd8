import type { ColumnRange } from '../shared/types.js';

/** Shorter values are masked entirely. */
const MIN_PARTIAL_LENGTH = 8;

/**
 * Keeps the first and last two characters and masks the rest, preserving
 * length. The result never allows reconstructing the value.
 */
export function maskValue(value: string): string {
  if (value.length < MIN_PARTIAL_LENGTH) return '*'.repeat(value.length);
  return `${value.slice(0, 2)}${'*'.repeat(value.length - 4)}${value.slice(-2)}`;
}

/** Masks every span of the line. Length is preserved, so columns stay valid. */
export function maskSpans(line: string, spans: readonly ColumnRange[]): string {
  let masked = line;
  for (const { start, end } of spans) {
    masked = masked.slice(0, start) + maskValue(masked.slice(start, end)) + masked.slice(end);
  }
  return masked;
}

/**
 * Context snippet around a span with every sensitive span on the line
 * masked, the target bracketed, and the window bounded on each side.
 */
export function contextPreview(
  line: string,
  target: ColumnRange,
  spans: readonly ColumnRange[],
  window: number
): string {
  const masked = maskSpans(line, spans);
  const { start, end } = target;
  const before = masked.slice(Math.max(0, start - window), start);
  const matched = masked.slice(start, end);
  const after = masked.slice(end, Math.min(masked.length, end + window));

  const prefix = start > window ? '...' : '';
  const suffix = end + window < masked.length ? '...' : '';

  return `${prefix}${before}[${matched}]${after}${suffix}`;
}
