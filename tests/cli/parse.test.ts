import { describe, expect, test } from 'vitest';
import { DEFAULT_LIMIT, optionsForMode, parseCliArgs } from '../../src/cli/parse';

describe('cli parser', () => {
  test('shows help when no args', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { kind: 'help' } });
  });

  test('parses help forms', () => {
    expect(parseCliArgs(['help'])).toEqual({ ok: true, command: { kind: 'help' } });
    expect(parseCliArgs(['report', '--help'])).toEqual({ ok: true, command: { kind: 'help' } });
    expect(parseCliArgs(['-h'])).toEqual({ ok: true, command: { kind: 'help' } });
  });

  test('parses version', () => {
    expect(parseCliArgs(['--version'])).toEqual({ ok: true, command: { kind: 'version' } });
    expect(parseCliArgs(['-v'])).toEqual({ ok: true, command: { kind: 'version' } });
  });

  test('joins the words of the term', () => {
    expect(parseCliArgs(['quarterly', 'report'])).toEqual({
      ok: true,
      command: { kind: 'search', term: 'quarterly report', offset: 0, limit: DEFAULT_LIMIT, color: true },
    });
  });

  test('accepts an explicit search subcommand', () => {
    const result = parseCliArgs(['search', 'notes', '--regex']);
    expect(result).toEqual({
      ok: true,
      command: { kind: 'search', term: 'notes', mode: 'regex', offset: 0, limit: 20, color: true },
    });
  });

  test('parses paging and layout options', () => {
    const result = parseCliArgs([
      'photo',
      '--offset',
      '40',
      '--limit=10',
      '--width',
      '80',
      '--index=./index.json',
      '--config',
      'alt.toml',
      '--no-color',
    ]);
    expect(result).toEqual({
      ok: true,
      command: {
        kind: 'search',
        term: 'photo',
        offset: 40,
        limit: 10,
        width: 80,
        indexFile: './index.json',
        configPath: 'alt.toml',
        color: false,
      },
    });
  });

  test('treats everything after -- as the term', () => {
    const result = parseCliArgs(['--', '-draft', '--plain']);
    expect(result).toEqual({
      ok: true,
      command: { kind: 'search', term: '-draft --plain', offset: 0, limit: 20, color: true },
    });
  });

  test('rejects conflicting modes', () => {
    expect(parseCliArgs(['a', '--regex', '--migemo'])).toEqual({
      ok: false,
      error: '--regex and --migemo cannot be combined.',
    });
  });

  test('allows repeating the same mode', () => {
    const result = parseCliArgs(['a', '--plain', '--plain']);
    expect(result.ok && result.command.kind === 'search' ? result.command.mode : undefined).toBe('plain');
  });

  test('validates numeric options', () => {
    expect(parseCliArgs(['a', '--offset', '-1'])).toEqual({
      ok: false,
      error: 'Offset must be a non-negative integer.',
    });
    expect(parseCliArgs(['a', '--limit', '0'])).toEqual({ ok: false, error: 'Limit must be a positive integer.' });
    expect(parseCliArgs(['a', '--width=35'])).toEqual({
      ok: false,
      error: 'Width must be an integer of at least 36.',
    });
  });

  test('reports a missing option value', () => {
    expect(parseCliArgs(['a', '--limit'])).toEqual({ ok: false, error: 'Missing value for --limit.' });
  });

  test('reports unknown flags', () => {
    expect(parseCliArgs(['a', '--json'])).toEqual({ ok: false, error: 'Unknown argument: --json' });
  });

  test('requires a term', () => {
    expect(parseCliArgs(['search', '--regex'])).toEqual({ ok: false, error: 'Missing search term.' });
    expect(parseCliArgs(['search', ' '])).toEqual({ ok: false, error: 'Missing search term.' });
  });
});

describe('optionsForMode', () => {
  test('maps each mode to its option flags', () => {
    expect(optionsForMode('regex')).toEqual({ regex: true, migemo: false });
    expect(optionsForMode('migemo')).toEqual({ regex: false, migemo: true });
    expect(optionsForMode('plain')).toEqual({ regex: false, migemo: false });
  });
});
