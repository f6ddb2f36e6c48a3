import { paintLayout } from '../core/cell-render';
import { DISPLAY_COLUMNS, type DisplayColumn } from '../core/display-cells';
import type { TextLayout } from '../core/text-layout';

export const SIZE_WIDTH = 12;
export const MODIFIED_WIDTH = 16;
const COLUMN_GAP = '  ';

export type ColumnWidths = Record<DisplayColumn, number>;

export interface RowRenderOptions {
  widths: ColumnWidths;
  ellipsis: string;
  ellipsisWidth: number;
  color: boolean;
}

/** Split a total row width between name (2/5) and path (3/5) */
export function columnWidths(totalWidth: number): ColumnWidths {
  const fixed = SIZE_WIDTH + MODIFIED_WIDTH + COLUMN_GAP.length * 3;
  const flexible = Math.max(2, totalWidth - fixed);
  const name = Math.max(1, Math.floor((flexible * 2) / 5));
  return { name, path: flexible - name, size: SIZE_WIDTH, modified: MODIFIED_WIDTH };
}

export function renderRow(layouts: Record<DisplayColumn, TextLayout>, options: RowRenderOptions): string {
  return DISPLAY_COLUMNS.map((column) =>
    paintLayout(layouts[column], {
      width: options.widths[column],
      ellipsis: options.ellipsis,
      ellipsisWidth: options.ellipsisWidth,
      color: options.color,
      align: column === 'size' ? 'right' : 'left',
    })
  )
    .join(COLUMN_GAP)
    .trimEnd();
}
