/**
 * Paints a text layout into a fixed-width terminal cell.
 */

import type { TextLayout } from './text-layout';

const HIGHLIGHT_ON = '\x1b[30;43m';
const RESET = '\x1b[0m';

export interface PaintOptions {
  width: number;
  ellipsis: string;
  ellipsisWidth: number;
  color: boolean;
  align?: 'left' | 'right';
}

/**
 * Segments are drawn at their `startX`; gaps left by clipping are filled
 * with spaces so the result is always exactly `width` cells wide.
 */
export function paintLayout(layout: TextLayout, options: PaintOptions): string {
  let output = '';
  let cursor = 0;

  for (const segment of layout.segments) {
    if (segment.startX > cursor) {
      output += ' '.repeat(segment.startX - cursor);
    }
    output += segment.fill && options.color ? `${HIGHLIGHT_ON}${segment.text}${RESET}` : segment.text;
    cursor = segment.startX + segment.width;
  }

  if (layout.ellipsisX !== undefined) {
    if (layout.ellipsisX > cursor) {
      output += ' '.repeat(layout.ellipsisX - cursor);
    }
    output += options.ellipsis;
    cursor = layout.ellipsisX + options.ellipsisWidth;
  }

  const padding = ' '.repeat(Math.max(0, options.width - cursor));
  return options.align === 'right' ? padding + output : output + padding;
}
