/**
 * Highlight-aware single-line text layout.
 *
 * Turns plain text plus highlight ranges into draw segments that fit a width
 * budget, cutting the text so an ellipsis still fits after it.
 */

import { isHighlightedAt, type HighlightRange } from './highlight-parser';

/**
 * Returns the cumulative width after each code point of `text`.
 * `result[k]` is the width of the first `k + 1` code points.
 */
export type MeasureText = (text: string) => readonly number[];

export interface LayoutInput {
  text: string;
  ranges: readonly HighlightRange[];
  widthBudget: number;
  measure: MeasureText;
  ellipsisWidth: number;
  /** Selected rows draw no highlight fill; layout is otherwise unchanged */
  selected?: boolean;
}

export interface DrawSegment {
  readonly text: string;
  readonly highlighted: boolean;
  /** Whether the caller should paint the highlight background */
  readonly fill: boolean;
  readonly startX: number;
  readonly width: number;
}

export interface TextLayout {
  readonly segments: readonly DrawSegment[];
  readonly truncated: boolean;
  readonly ellipsisX: number | undefined;
  /** Code points kept before the cut (the prefix the segments cover) */
  readonly visibleCount: number;
}

function buildExtentTable(chars: readonly string[], text: string, measure: MeasureText): number[] {
  const widths = chars.length > 0 ? measure(text) : [];
  const table = [0];
  let previous = 0;
  for (let i = 0; i < chars.length; i++) {
    // Monotonic even if the measure function is not
    const next = Math.max(previous, widths[i] ?? previous);
    table.push(next);
    previous = next;
  }
  return table;
}

function fitCount(extents: readonly number[], budget: number): number {
  let count = 0;
  while (count + 1 < extents.length && (extents[count + 1] ?? Infinity) <= budget) {
    count++;
  }
  return count;
}

export function layoutText(input: LayoutInput): TextLayout {
  const { text, ranges, widthBudget, measure, ellipsisWidth } = input;
  const selected = input.selected ?? false;
  const chars = Array.from(text);
  const extents = buildExtentTable(chars, text, measure);
  const extent = (count: number): number => extents[count] ?? 0;

  const maxFitCount = fitCount(extents, widthBudget);
  const truncated = chars.length > maxFitCount;

  let visibleCount = maxFitCount;
  if (truncated) {
    const available = widthBudget - ellipsisWidth;
    visibleCount = available > 0 ? Math.min(fitCount(extents, available), maxFitCount) : 0;
  }

  const segments: DrawSegment[] = [];
  let cursor = 0;
  let position = 0;
  let lastDrawn = 0;

  while (position < visibleCount) {
    const highlighted = isHighlightedAt(ranges, position);
    let end = position + 1;
    while (end < visibleCount && isHighlightedAt(ranges, end) === highlighted) {
      end++;
    }

    const segmentWidth = extent(end) - extent(position);
    const width = Math.min(segmentWidth, widthBudget - cursor);
    if (width <= 0 || cursor >= widthBudget) break;

    segments.push({
      text: chars.slice(position, end).join(''),
      highlighted,
      fill: highlighted && !selected,
      startX: cursor,
      width,
    });

    cursor += width;
    position = end;
    lastDrawn = end;
    if (cursor >= widthBudget) break;
  }

  const ellipsisX =
    truncated && lastDrawn < chars.length && cursor + ellipsisWidth <= widthBudget
      ? cursor
      : undefined;

  return { segments, truncated, ellipsisX, visibleCount };
}
