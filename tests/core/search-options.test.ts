import { describe, expect, it } from 'vitest';
import {
  createInitialOptions,
  searchOptionsReducer,
  usesRegexQuery,
} from '../../src/core/operations/search-options';

describe('search options', () => {
  it('starts with migemo on', () => {
    expect(createInitialOptions()).toEqual({ regex: false, migemo: true, shellContextMenu: false });
  });

  it('lets migemo win when both modes are requested', () => {
    expect(createInitialOptions({ regex: true })).toEqual({ regex: false, migemo: true, shellContextMenu: false });
    expect(createInitialOptions({ regex: true, migemo: false }).regex).toBe(true);
  });

  it('turns migemo off when regex is turned on', () => {
    const state = searchOptionsReducer(createInitialOptions(), { type: 'TOGGLE_REGEX' });
    expect(state).toEqual({ regex: true, migemo: false, shellContextMenu: false });
    expect(searchOptionsReducer(state, { type: 'TOGGLE_REGEX' })).toEqual({
      regex: false,
      migemo: false,
      shellContextMenu: false,
    });
  });

  it('turns regex off when migemo is turned on', () => {
    const state = searchOptionsReducer(
      { regex: true, migemo: false, shellContextMenu: false },
      { type: 'TOGGLE_MIGEMO' }
    );
    expect(state).toEqual({ regex: false, migemo: true, shellContextMenu: false });
  });

  it('sets the shell context menu flag', () => {
    const state = searchOptionsReducer(createInitialOptions(), { type: 'SET_SHELL_CONTEXT_MENU', enabled: true });
    expect(state.shellContextMenu).toBe(true);
    expect(state.migemo).toBe(true);
  });

  it('sends regex queries for both regex and migemo', () => {
    expect(usesRegexQuery({ regex: true, migemo: false, shellContextMenu: false })).toBe(true);
    expect(usesRegexQuery({ regex: false, migemo: true, shellContextMenu: false })).toBe(true);
    expect(usesRegexQuery({ regex: false, migemo: false, shellContextMenu: false })).toBe(false);
  });
});
