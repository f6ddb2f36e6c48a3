/**
 * Search option state and action types
 */

export interface SearchOptions {
  /** Send the input to the provider as a regular expression */
  regex: boolean;
  /** Expand romaji input through the query dictionary (implies regex) */
  migemo: boolean;
  /** Use the platform context menu instead of the built-in one */
  shellContextMenu: boolean;
}

export type SearchOptionsAction =
  | { type: 'TOGGLE_REGEX' }
  | { type: 'TOGGLE_MIGEMO' }
  | { type: 'SET_SHELL_CONTEXT_MENU'; enabled: boolean };
