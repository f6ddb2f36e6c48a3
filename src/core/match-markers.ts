/**
 * Builds marker-delimited highlight strings from match spans.
 * This is the producer side of the `*` convention read by highlight-parser.
 */

import { HIGHLIGHT_MARKER } from './highlight-parser';

/** UTF-16 index span `[start, end)` into the source string */
export interface MatchSpan {
  start: number;
  end: number;
}

export function mergeSpans(spans: readonly MatchSpan[]): MatchSpan[] {
  const sorted = spans
    .filter((span) => span.end > span.start)
    .map((span) => ({ ...span }))
    .sort((a, b) => a.start - b.start);

  const merged: MatchSpan[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push(span);
    }
  }
  return merged;
}

export function markSpans(text: string, spans: readonly MatchSpan[]): string {
  let output = '';
  let cursor = 0;
  for (const span of mergeSpans(spans)) {
    output += text.slice(cursor, span.start);
    output += HIGHLIGHT_MARKER + text.slice(span.start, span.end) + HIGHLIGHT_MARKER;
    cursor = span.end;
  }
  return output + text.slice(cursor);
}

/** Case-insensitive literal pattern for one search word */
export function wordPattern(word: string): RegExp {
  return new RegExp(word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'iu');
}

/** Case-insensitive occurrences of each word, indexed into the original text */
export function findWordSpans(text: string, words: readonly string[]): MatchSpan[] {
  return words
    .filter((word) => word.length > 0)
    .flatMap((word) => findPatternSpans(text, wordPattern(word)));
}

export function findPatternSpans(text: string, pattern: RegExp): MatchSpan[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const global = new RegExp(pattern.source, flags);
  const spans: MatchSpan[] = [];
  for (const match of text.matchAll(global)) {
    const start = match.index ?? 0;
    if (match[0].length === 0) continue;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}
