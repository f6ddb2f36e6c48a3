import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { parseHighlight } from '../../src/core/highlight-parser';
import { layoutText } from '../../src/core/text-layout';
import { terminalMeasure, uniformMeasure } from '../../src/core/char-width';

describe('layoutText', () => {
  it('cuts the text so the ellipsis fits after it', () => {
    const layout = layoutText({
      text: 'abcdefghij',
      ranges: [],
      widthBudget: 55,
      measure: uniformMeasure(10),
      ellipsisWidth: 20,
    });

    expect(layout).toEqual({
      segments: [{ text: 'abc', highlighted: false, fill: false, startX: 0, width: 30 }],
      truncated: true,
      ellipsisX: 30,
      visibleCount: 3,
    });
  });

  it('alternates highlighted and plain segments when everything fits', () => {
    const { plainText, ranges } = parseHighlight('*foo*bar*baz*');
    const layout = layoutText({
      text: plainText,
      ranges,
      widthBudget: 100,
      measure: uniformMeasure(10),
      ellipsisWidth: 20,
    });

    expect(layout.truncated).toBe(false);
    expect(layout.ellipsisX).toBeUndefined();
    expect(layout.visibleCount).toBe(9);
    expect(layout.segments).toEqual([
      { text: 'foo', highlighted: true, fill: true, startX: 0, width: 30 },
      { text: 'bar', highlighted: false, fill: false, startX: 30, width: 30 },
      { text: 'baz', highlighted: true, fill: true, startX: 60, width: 30 },
    ]);
  });

  it('keeps highlight state but drops the fill on selected rows', () => {
    const layout = layoutText({
      text: 'foobar',
      ranges: [{ start: 0, end: 3 }],
      widthBudget: 100,
      measure: uniformMeasure(1),
      ellipsisWidth: 3,
      selected: true,
    });

    expect(layout.segments.map((segment) => [segment.highlighted, segment.fill])).toEqual([
      [true, false],
      [false, false],
    ]);
  });

  it('returns no segments for empty text', () => {
    expect(
      layoutText({ text: '', ranges: [], widthBudget: 10, measure: uniformMeasure(1), ellipsisWidth: 3 })
    ).toEqual({ segments: [], truncated: false, ellipsisX: undefined, visibleCount: 0 });
  });

  it('returns no segments and no ellipsis for a zero budget', () => {
    expect(
      layoutText({ text: 'abc', ranges: [], widthBudget: 0, measure: uniformMeasure(10), ellipsisWidth: 20 })
    ).toEqual({ segments: [], truncated: true, ellipsisX: undefined, visibleCount: 0 });
  });

  it('omits the ellipsis when it does not fit either', () => {
    const layout = layoutText({
      text: 'abcdef',
      ranges: [],
      widthBudget: 25,
      measure: uniformMeasure(10),
      ellipsisWidth: 30,
    });

    expect(layout.segments).toEqual([]);
    expect(layout.truncated).toBe(true);
    expect(layout.ellipsisX).toBeUndefined();
  });

  it('draws only the ellipsis when the budget equals its width', () => {
    const layout = layoutText({
      text: 'abcdef',
      ranges: [],
      widthBudget: 30,
      measure: uniformMeasure(10),
      ellipsisWidth: 30,
    });

    expect(layout.segments).toEqual([]);
    expect(layout.ellipsisX).toBe(0);
  });

  it('measures wide characters in terminal cells', () => {
    const layout = layoutText({
      text: '日本語abc',
      ranges: [{ start: 1, end: 2 }],
      widthBudget: 5,
      measure: terminalMeasure,
      ellipsisWidth: 1,
    });

    expect(layout.segments).toEqual([
      { text: '日', highlighted: false, fill: false, startX: 0, width: 2 },
      { text: '本', highlighted: true, fill: true, startX: 2, width: 2 },
    ]);
    expect(layout.ellipsisX).toBe(4);
  });

  it('draws exactly the visible prefix within the budget', () => {
    fc.assert(
      fc.property(
        fc.string({ maxLength: 40 }),
        fc.integer({ min: 1, max: 20 }),
        fc.integer({ min: 0, max: 300 }),
        fc.integer({ min: 0, max: 40 }),
        (marked, charWidth, widthBudget, ellipsisWidth) => {
          const { plainText, ranges } = parseHighlight(marked);
          const layout = layoutText({
            text: plainText,
            ranges,
            widthBudget,
            measure: uniformMeasure(charWidth),
            ellipsisWidth,
          });

          const drawn = layout.segments.map((segment) => segment.text).join('');
          expect(drawn).toBe(Array.from(plainText).slice(0, layout.visibleCount).join(''));

          let cursor = 0;
          layout.segments.forEach((segment, i) => {
            expect(segment.text).not.toBe('');
            expect(segment.startX).toBe(cursor);
            cursor += segment.width;
            if (i > 0) {
              expect(segment.highlighted).not.toBe(layout.segments[i - 1]?.highlighted);
            }
          });
          expect(cursor).toBeLessThanOrEqual(widthBudget);
          if (layout.ellipsisX !== undefined) {
            expect(layout.ellipsisX + ellipsisWidth).toBeLessThanOrEqual(widthBudget);
          }
        }
      )
    );
  });
});
