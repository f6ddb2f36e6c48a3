import type { SearchOptions } from '../core/operations/search-options';

export type QueryMode = 'plain' | 'regex' | 'migemo';

export interface SearchCommand {
  kind: 'search';
  term: string;
  /** Unset means "use the configured options" */
  mode?: QueryMode;
  offset: number;
  limit: number;
  /** Total row width in terminal cells; unset means "use the configured column widths" */
  width?: number;
  indexFile?: string;
  configPath?: string;
  color: boolean;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | SearchCommand;

export type ParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

const HELP_FLAGS = new Set(['-h', '--help']);
const VERSION_FLAGS = new Set(['-v', '--version']);
const MODE_FLAGS = new Map<string, QueryMode>([
  ['--regex', 'regex'],
  ['--migemo', 'migemo'],
  ['--plain', 'plain'],
]);

export const DEFAULT_LIMIT = 20;

/** Narrowest row the fixed size and date columns leave room for */
export const MIN_ROW_WIDTH = 36;

function readOptionValue(args: string[], index: number, flag: string): { value: string; nextIndex: number } | { error: string } {
  const arg = args[index] ?? '';
  const eqIndex = arg.indexOf('=');
  if (eqIndex >= 0) {
    return { value: arg.slice(eqIndex + 1), nextIndex: index };
  }
  const next = args[index + 1];
  if (!next) {
    return { error: `Missing value for ${flag}.` };
  }
  return { value: next, nextIndex: index + 1 };
}

function parseCount(value: string, minimum: number): number | null {
  if (!/^\d+$/.test(value)) return null;
  const parsed = Number(value);
  return parsed >= minimum ? parsed : null;
}

function matchesFlag(arg: string, flag: string): boolean {
  return arg === flag || arg.startsWith(`${flag}=`);
}

/** Initial option overrides for a query mode */
export function optionsForMode(mode: QueryMode): Partial<SearchOptions> {
  switch (mode) {
    case 'regex':
      return { regex: true, migemo: false };
    case 'migemo':
      return { regex: false, migemo: true };
    case 'plain':
      return { regex: false, migemo: false };
  }
}

function parseSearch(args: string[]): ParseResult {
  const words: string[] = [];
  let mode: QueryMode | undefined;
  let offset = 0;
  let limit = DEFAULT_LIMIT;
  let width: number | undefined;
  let indexFile: string | undefined;
  let configPath: string | undefined;
  let color = true;
  let literal = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (literal || !arg.startsWith('-')) {
      words.push(arg);
      continue;
    }
    if (arg === '--') {
      literal = true;
      continue;
    }
    const flagMode = MODE_FLAGS.get(arg);
    if (flagMode) {
      if (mode && mode !== flagMode) {
        return { ok: false, error: `--${mode} and --${flagMode} cannot be combined.` };
      }
      mode = flagMode;
      continue;
    }
    if (arg === '--no-color') {
      color = false;
      continue;
    }
    if (matchesFlag(arg, '--offset')) {
      const value = readOptionValue(args, i, '--offset');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseCount(value.value, 0);
      if (parsed === null) return { ok: false, error: 'Offset must be a non-negative integer.' };
      offset = parsed;
      i = value.nextIndex;
      continue;
    }
    if (matchesFlag(arg, '--limit')) {
      const value = readOptionValue(args, i, '--limit');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseCount(value.value, 1);
      if (parsed === null) return { ok: false, error: 'Limit must be a positive integer.' };
      limit = parsed;
      i = value.nextIndex;
      continue;
    }
    if (matchesFlag(arg, '--width')) {
      const value = readOptionValue(args, i, '--width');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseCount(value.value, MIN_ROW_WIDTH);
      if (parsed === null) return { ok: false, error: `Width must be an integer of at least ${MIN_ROW_WIDTH}.` };
      width = parsed;
      i = value.nextIndex;
      continue;
    }
    if (matchesFlag(arg, '--index')) {
      const value = readOptionValue(args, i, '--index');
      if ('error' in value) return { ok: false, error: value.error };
      indexFile = value.value;
      i = value.nextIndex;
      continue;
    }
    if (matchesFlag(arg, '--config')) {
      const value = readOptionValue(args, i, '--config');
      if ('error' in value) return { ok: false, error: value.error };
      configPath = value.value;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  const term = words.join(' ').trim();
  if (!term) {
    return { ok: false, error: 'Missing search term.' };
  }

  const command: SearchCommand = { kind: 'search', term, offset, limit, color };
  if (mode) command.mode = mode;
  if (width !== undefined) command.width = width;
  if (indexFile !== undefined) command.indexFile = indexFile;
  if (configPath !== undefined) command.configPath = configPath;
  return { ok: true, command };
}

export function parseCliArgs(args: string[]): ParseResult {
  if (args[0] === 'help' || args.some((arg) => HELP_FLAGS.has(arg))) {
    return { ok: true, command: { kind: 'help' } };
  }

  if (args.some((arg) => VERSION_FLAGS.has(arg))) {
    return { ok: true, command: { kind: 'version' } };
  }

  if (args.length === 0) {
    return { ok: true, command: { kind: 'help' } };
  }

  const rest = args[0] === 'search' ? args.slice(1) : args;
  return parseSearch(rest);
}
