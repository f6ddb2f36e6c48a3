/**
 * Search options reducer
 */

import type { SearchOptions, SearchOptionsAction } from './types';

/**
 * Initial options: migemo on, as the search box expects romaji input by default
 */
export function createInitialOptions(overrides?: Partial<SearchOptions>): SearchOptions {
  const options: SearchOptions = {
    regex: false,
    migemo: true,
    shellContextMenu: false,
    ...overrides,
  };
  // Regex and migemo are mutually exclusive; migemo wins when both are requested
  if (options.regex && options.migemo) {
    options.regex = false;
  }
  return options;
}

export function searchOptionsReducer(state: SearchOptions, action: SearchOptionsAction): SearchOptions {
  switch (action.type) {
    case 'TOGGLE_REGEX': {
      const regex = !state.regex;
      return { ...state, regex, migemo: regex ? false : state.migemo };
    }

    case 'TOGGLE_MIGEMO': {
      const migemo = !state.migemo;
      return { ...state, migemo, regex: migemo ? false : state.regex };
    }

    case 'SET_SHELL_CONTEXT_MENU':
      return { ...state, shellContextMenu: action.enabled };

    default:
      return state;
  }
}

/** Whether the provider should treat the term as a regular expression */
export function usesRegexQuery(options: SearchOptions): boolean {
  return options.regex || options.migemo;
}
