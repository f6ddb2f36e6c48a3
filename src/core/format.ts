/**
 * Column formatting for result records.
 */

/** 100-ns ticks between 1601-01-01 and 1970-01-01 (UTC) */
const FILETIME_UNIX_EPOCH_TICKS = 116_444_736_000_000_000n;
const TICKS_PER_MILLISECOND = 10_000n;

export function formatWithCommas(value: number | bigint): string {
  const digits = value.toString();
  const negative = digits.startsWith('-');
  const body = negative ? digits.slice(1) : digits;
  const groups: string[] = [];
  for (let end = body.length; end > 0; end -= 3) {
    groups.unshift(body.slice(Math.max(0, end - 3), end));
  }
  return `${negative ? '-' : ''}${groups.join(',')}`;
}

/** Sizes are shown in kilobytes, rounded up. Folders and empty files show nothing. */
export function formatSize(bytes: number, isFolder = false): string {
  if (isFolder || bytes <= 0) return '';
  const kilobytes = Math.ceil(bytes / 1024);
  return `${formatWithCommas(kilobytes)} KB`;
}

export function fileTimeToDate(ticks: bigint): Date {
  const millis = (ticks - FILETIME_UNIX_EPOCH_TICKS) / TICKS_PER_MILLISECOND;
  return new Date(Number(millis));
}

export function dateToFileTime(date: Date): bigint {
  return BigInt(date.getTime()) * TICKS_PER_MILLISECOND + FILETIME_UNIX_EPOCH_TICKS;
}

const pad2 = (value: number): string => value.toString().padStart(2, '0');

/** Local `YYYY-MM-DD HH:mm`; zero means "unknown" and formats as empty. */
export function formatFileTime(ticks: bigint): string {
  if (ticks <= 0n) return '';
  const date = fileTimeToDate(ticks);
  if (Number.isNaN(date.getTime())) return '';
  const year = date.getFullYear().toString().padStart(4, '0');
  return `${year}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}
