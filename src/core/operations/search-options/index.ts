/**
 * Search options module
 */

export type { SearchOptions, SearchOptionsAction } from './types';
export { createInitialOptions, searchOptionsReducer, usesRegexQuery } from './reducer';
