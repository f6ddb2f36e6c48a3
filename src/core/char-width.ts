/**
 * Measure functions for the text layout engine.
 */

import type { MeasureText } from './text-layout';

/** Every code point has the same width */
export function uniformMeasure(charWidth: number): MeasureText {
  return (text) => {
    const widths: number[] = [];
    let total = 0;
    for (const _char of text) {
      total += charWidth;
      widths.push(total);
    }
    return widths;
  };
}

// East Asian Wide and Fullwidth blocks that terminals render in two cells
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

export function cellWidth(codePoint: number): number {
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) return 0;
  if (codePoint >= 0x300 && codePoint <= 0x36f) return 0;
  for (const [low, high] of WIDE_RANGES) {
    if (codePoint >= low && codePoint <= high) return 2;
  }
  return 1;
}

/** Terminal cell widths */
export const terminalMeasure: MeasureText = (text) => {
  const widths: number[] = [];
  let total = 0;
  for (const char of text) {
    total += cellWidth(char.codePointAt(0) ?? 0);
    widths.push(total);
  }
  return widths;
};

export function measureWidth(measure: MeasureText, text: string): number {
  const widths = measure(text);
  return widths.length > 0 ? widths[widths.length - 1] ?? 0 : 0;
}
