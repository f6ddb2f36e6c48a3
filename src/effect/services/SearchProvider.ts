/**
 * SearchProvider service: answers `(term, regex, offset, max)` with one page
 * of records plus the total match count.
 */
import fs from "node:fs"
import { Context, Effect, Layer, Schema } from "effect"
import { IndexFileError, SearchProviderError } from "../errors"
import { IndexEntry, IndexFile, ResultPage, ResultRecord } from "../models"
import { MatchCount } from "../types"
import { AppConfig } from "../Config"
import {
  findPatternSpans,
  findWordSpans,
  markSpans,
  type MatchSpan,
  wordPattern,
} from "../../core/match-markers"
import { HIGHLIGHT_MARKER } from "../../core/highlight-parser"

// =============================================================================
// Types
// =============================================================================

export interface SearchQuery {
  readonly term: string
  readonly regex: boolean
  readonly offset: number
  readonly max: number
}

export interface SearchProviderShape {
  readonly query: (request: SearchQuery) => Effect.Effect<ResultPage, SearchProviderError>
}

// =============================================================================
// Everything HTTP Provider
// =============================================================================

const NumberOrString = Schema.Union(Schema.Number, Schema.String)

const EverythingResult = Schema.Struct({
  type: Schema.optionalWith(Schema.String, { default: () => "file" }),
  name: Schema.String,
  path: Schema.optionalWith(Schema.String, { default: () => "" }),
  size: Schema.optional(NumberOrString),
  date_modified: Schema.optional(NumberOrString),
})

const EverythingResponse = Schema.Struct({
  totalResults: Schema.Number,
  results: Schema.Array(EverythingResult),
})

type EverythingResult = typeof EverythingResult.Type

const toSize = (value: number | string | undefined): number => {
  if (value === undefined || value === "") return 0
  const size = typeof value === "number" ? value : Number(value)
  return Number.isFinite(size) && size > 0 ? size : 0
}

const toTicks = (value: number | string | undefined): bigint => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? BigInt(value) : 0n
  }
  if (value !== undefined && /^\d+$/.test(value)) return BigInt(value)
  return 0n
}

const fromEverythingResult = (result: EverythingResult): ResultRecord => {
  const isFolder = result.type === "folder"
  return ResultRecord.make({
    name: result.name,
    path: result.path,
    size: isFolder ? 0 : toSize(result.size),
    modifiedTimestamp: toTicks(result.date_modified),
    highlightedName: "",
    highlightedPath: "",
    isFolder,
  })
}

/** Query string understood by the Everything HTTP server */
export const buildEverythingUrl = (baseUrl: string, request: SearchQuery): string => {
  const url = new URL(baseUrl)
  url.searchParams.set("search", request.term)
  url.searchParams.set("json", "1")
  url.searchParams.set("path_column", "1")
  url.searchParams.set("size_column", "1")
  url.searchParams.set("date_modified_column", "1")
  url.searchParams.set("offset", String(request.offset))
  url.searchParams.set("count", String(request.max))
  url.searchParams.set("regex", request.regex ? "1" : "0")
  return url.toString()
}

export const makeEverythingProvider = (baseUrl: string): SearchProviderShape => {
  const query = Effect.fn("SearchProvider.query")(function* (request: SearchQuery) {
    const fail = (reason: SearchProviderError["reason"], message: string, cause?: unknown) =>
      new SearchProviderError({
        reason,
        term: request.term,
        offset: request.offset,
        message,
        cause,
      })

    const response = yield* Effect.tryPromise({
      try: (signal) => fetch(buildEverythingUrl(baseUrl, request), { signal }),
      catch: (cause) => fail("unreachable", `Cannot reach ${baseUrl}`, cause),
    }).pipe(
      Effect.timeout("10 seconds"),
      Effect.catchTag("TimeoutException", () =>
        fail("unreachable", `No response from ${baseUrl} within 10 seconds`)
      )
    )

    if (!response.ok) {
      return yield* fail("bad-status", `HTTP ${response.status}`)
    }

    const body = yield* Effect.tryPromise({
      try: (): Promise<unknown> => response.json(),
      catch: (cause) => fail("malformed", "Response is not JSON", cause),
    })

    const decoded = yield* Schema.decodeUnknown(EverythingResponse)(body).pipe(
      Effect.mapError((error) => fail("malformed", error.message, error))
    )

    const total = Math.max(0, Math.trunc(decoded.totalResults))
    return ResultPage.make({
      records: decoded.results.map(fromEverythingResult),
      total: MatchCount.make(total),
    })
  })

  return { query }
}

// =============================================================================
// In-Memory Provider
// =============================================================================

interface Matcher {
  readonly matches: (name: string) => boolean
  readonly spans: (name: string) => MatchSpan[]
}

const wordMatcher = (term: string): Matcher => {
  const words = term.split(/\s+/).filter((word) => word.length > 0)
  const patterns = words.map(wordPattern)
  return {
    matches: (name) => patterns.every((pattern) => pattern.test(name)),
    spans: (name) => findWordSpans(name, words),
  }
}

const patternMatcher = (pattern: RegExp): Matcher => ({
  matches: (name) => pattern.test(name),
  spans: (name) => findPatternSpans(name, pattern),
})

/** A name that already contains the marker cannot be marked unambiguously */
const toResultRecord = (entry: IndexEntry, matcher: Matcher): ResultRecord =>
  ResultRecord.make({
    name: entry.name,
    path: entry.path,
    size: entry.isFolder ? 0 : entry.size,
    modifiedTimestamp: entry.modified,
    highlightedName: entry.name.includes(HIGHLIGHT_MARKER)
      ? ""
      : markSpans(entry.name, matcher.spans(entry.name)),
    highlightedPath: "",
    isFolder: entry.isFolder,
  })

/**
 * Provider over a fixed list of entries. Plain terms match when every
 * whitespace-separated word occurs in the name; regex terms are matched
 * case-insensitively. Results keep the input order.
 */
export const makeMemoryProvider = (entries: ReadonlyArray<IndexEntry>): SearchProviderShape => {
  const query = Effect.fn("SearchProvider.query")(function* (request: SearchQuery) {
    let matcher: Matcher
    if (request.regex) {
      const pattern = yield* Effect.try({
        try: () => new RegExp(request.term, "i"),
        catch: (cause) =>
          new SearchProviderError({
            reason: "malformed",
            term: request.term,
            offset: request.offset,
            message: `Invalid regular expression: ${request.term}`,
            cause,
          }),
      })
      matcher = patternMatcher(pattern)
    } else {
      matcher = wordMatcher(request.term)
    }

    const matched = entries.filter((entry) => matcher.matches(entry.name))
    const offset = Math.max(0, request.offset)
    const max = Math.max(0, request.max)
    return ResultPage.make({
      records: matched.slice(offset, offset + max).map((entry) => toResultRecord(entry, matcher)),
      total: MatchCount.make(matched.length),
    })
  })

  return { query }
}

/** Read and validate a JSON index file */
export const loadIndexFile = (path: string) =>
  Effect.try({
    try: () => fs.readFileSync(path, "utf8"),
    catch: (cause) => new IndexFileError({ path, cause }),
  }).pipe(
    Effect.flatMap((source) =>
      Effect.try({
        try: (): unknown => JSON.parse(source),
        catch: (cause) => new IndexFileError({ path, cause }),
      })
    ),
    Effect.flatMap((raw) =>
      Schema.decodeUnknown(IndexFile)(raw).pipe(
        Effect.mapError((cause) => new IndexFileError({ path, cause }))
      )
    )
  )

// =============================================================================
// SearchProvider Service
// =============================================================================

export class SearchProvider extends Context.Tag("@everyfind/SearchProvider")<
  SearchProvider,
  SearchProviderShape
>() {
  /** Production layer - Everything HTTP server at the configured URL */
  static readonly layer = Layer.effect(
    SearchProvider,
    Effect.map(AppConfig, (config) => SearchProvider.of(makeEverythingProvider(config.everythingUrl)))
  )

  /** Searches the entries of a JSON index file in memory */
  static readonly indexFileLayer = (path: string) =>
    Layer.effect(
      SearchProvider,
      Effect.map(loadIndexFile(path), (entries) => SearchProvider.of(makeMemoryProvider(entries)))
    )

  static readonly memoryLayer = (entries: ReadonlyArray<IndexEntry>) =>
    Layer.succeed(SearchProvider, makeMemoryProvider(entries))

  /** Test layer - provider with no entries */
  static readonly testLayer = Layer.succeed(SearchProvider, makeMemoryProvider([]))
}
