/**
 * Parser for provider-supplied highlight markers.
 *
 * The provider wraps matched substrings in a single toggle character:
 * `*foo*bar` highlights "foo". Ranges are expressed in code points of the
 * stripped text.
 */

export const HIGHLIGHT_MARKER = '*';

/** Half-open code point interval `[start, end)` */
export interface HighlightRange {
  readonly start: number;
  readonly end: number;
}

export interface ParsedHighlight {
  readonly plainText: string;
  readonly ranges: readonly HighlightRange[];
}

export function parseHighlight(marked: string): ParsedHighlight {
  let plainText = '';
  let emitted = 0;
  let runStart = 0;
  let inHighlight = false;
  const ranges: HighlightRange[] = [];

  for (const char of marked) {
    if (char === HIGHLIGHT_MARKER) {
      if (inHighlight) {
        ranges.push({ start: runStart, end: emitted });
      } else {
        runStart = emitted;
      }
      inHighlight = !inHighlight;
      continue;
    }
    plainText += char;
    emitted++;
  }

  // An unterminated run is dropped: only closed ranges are recorded.
  return { plainText, ranges };
}

/**
 * Whether the code point at `index` falls inside any range.
 * Empty ranges never match.
 */
export function isHighlightedAt(ranges: readonly HighlightRange[], index: number): boolean {
  return ranges.some((range) => index >= range.start && index < range.end);
}
