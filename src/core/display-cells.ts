/**
 * Per-column display text for result rows.
 */

import { parseHighlight, type HighlightRange } from './highlight-parser';
import { formatFileTime, formatSize } from './format';

export type DisplayColumn = 'name' | 'path' | 'size' | 'modified';

export const DISPLAY_COLUMNS: readonly DisplayColumn[] = ['name', 'path', 'size', 'modified'];

/** Fields of a result record the list view reads */
export interface DisplayRecord {
  readonly name: string;
  readonly path: string;
  readonly size: number;
  readonly modifiedTimestamp: bigint;
  readonly highlightedName: string;
  readonly highlightedPath: string;
  readonly isFolder: boolean;
}

export interface CellText {
  readonly text: string;
  readonly ranges: readonly HighlightRange[];
}

const plain = (text: string): CellText => ({ text, ranges: [] });

/** C0 and C1 control characters */
const CONTROL_CHARACTERS = /[\x00-\x1f\x7f-\x9f]/g;

/** Replaces each control character with U+FFFD, keeping every other position */
export function replaceControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '\uFFFD');
}

function highlightedOrPlain(highlighted: string, fallback: string): CellText {
  if (highlighted === '') return plain(replaceControlCharacters(fallback));
  const parsed = parseHighlight(highlighted);
  return { text: replaceControlCharacters(parsed.plainText), ranges: parsed.ranges };
}

/**
 * Text for one cell. A fresh value per call; callers may hold on to it for
 * the duration of a draw.
 */
export function cellText(record: DisplayRecord, column: DisplayColumn): CellText {
  switch (column) {
    case 'name':
      return highlightedOrPlain(record.highlightedName, record.name);
    case 'path':
      return highlightedOrPlain(record.highlightedPath, record.path);
    case 'size':
      return plain(formatSize(record.size, record.isFolder));
    case 'modified':
      return plain(formatFileTime(record.modifiedTimestamp));
  }
}

export function hasHighlights(cell: CellText): boolean {
  return cell.ranges.some((range) => range.end > range.start);
}
