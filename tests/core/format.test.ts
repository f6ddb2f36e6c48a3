import { describe, expect, it } from 'vitest';
import {
  dateToFileTime,
  fileTimeToDate,
  formatFileTime,
  formatSize,
  formatWithCommas,
} from '../../src/core/format';

describe('formatWithCommas', () => {
  it('groups digits by three', () => {
    expect(formatWithCommas(0)).toBe('0');
    expect(formatWithCommas(999)).toBe('999');
    expect(formatWithCommas(1000)).toBe('1,000');
    expect(formatWithCommas(1234567)).toBe('1,234,567');
    expect(formatWithCommas(-1234)).toBe('-1,234');
    expect(formatWithCommas(12345678901234567890n)).toBe('12,345,678,901,234,567,890');
  });
});

describe('formatSize', () => {
  it('shows kilobytes rounded up', () => {
    expect(formatSize(1)).toBe('1 KB');
    expect(formatSize(1024)).toBe('1 KB');
    expect(formatSize(1025)).toBe('2 KB');
    expect(formatSize(1048576)).toBe('1,024 KB');
  });

  it('shows nothing for folders and empty files', () => {
    expect(formatSize(0)).toBe('');
    expect(formatSize(5000, true)).toBe('');
  });
});

describe('file times', () => {
  it('converts between ticks and dates at the Unix epoch', () => {
    expect(fileTimeToDate(116444736000000000n).getTime()).toBe(0);
    expect(dateToFileTime(new Date(0))).toBe(116444736000000000n);
  });

  it('formats local time to the minute', () => {
    const ticks = dateToFileTime(new Date(2024, 0, 2, 3, 4, 59));
    expect(formatFileTime(ticks)).toBe('2024-01-02 03:04');
  });

  it('formats unknown times as empty', () => {
    expect(formatFileTime(0n)).toBe('');
    expect(formatFileTime(-5n)).toBe('');
  });
});
