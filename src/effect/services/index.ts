/**
 * Effect services barrel export.
 */
export * from "./Clipboard"
export * from "./QueryDictionary"
export * from "./SearchProvider"
export * from "./ShellActions"
export * from "./PagedResultCache"
export * from "./SearchSession"
export * from "./subscription-registry"
