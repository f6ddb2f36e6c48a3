/**
 * On-demand paged cache over a SearchProvider.
 *
 * Exactly one page of records is resident. Rows inside it are served from
 * memory; any other row reloads the page that contains it. Every provider call
 * carries the generation it was issued under, and a response that comes back
 * after the active query changed is dropped.
 */
import { Effect, Option, Ref } from "effect"
import { ResultPage, type ResultRecord } from "../models"
import type { PageSize } from "../types"
import { SearchProvider } from "./SearchProvider"

// =============================================================================
// Types
// =============================================================================

export interface ActiveQuery {
  readonly term: string
  readonly regex: boolean
}

export interface SearchOutcome {
  readonly total: number
  /** The provider call failed; `total` is 0 */
  readonly failed: boolean
  /** The query changed while the call was in flight; nothing was stored */
  readonly stale: boolean
}

export interface CacheSnapshot {
  readonly residentOffset: number
  readonly residentCount: number
  readonly term: string
  readonly regex: boolean
  readonly totalCount: number
  readonly pageSize: number
}

export interface PagedResultCache {
  readonly setQuery: (term: string, regex?: boolean) => Effect.Effect<void>
  readonly ensure: (index: number) => Effect.Effect<Option.Option<ResultRecord>>
  readonly invalidate: () => Effect.Effect<void>
  readonly search: () => Effect.Effect<SearchOutcome>
  readonly inspect: () => Effect.Effect<CacheSnapshot>
}

interface CacheState {
  readonly residentOffset: number
  readonly residentRecords: ReadonlyArray<ResultRecord>
  readonly query: ActiveQuery
  readonly totalCount: number
  readonly generation: number
}

const initialState: CacheState = {
  residentOffset: 0,
  residentRecords: [],
  query: { term: "", regex: false },
  totalCount: 0,
  generation: 0,
}

/** First row of the page containing `index` */
export const pageStartFor = (index: number, pageSize: number): number =>
  Math.floor(index / pageSize) * pageSize

// =============================================================================
// PagedResultCache
// =============================================================================

export const makePagedResultCache = (options: { readonly pageSize: PageSize }) =>
  Effect.gen(function* () {
    const provider = yield* SearchProvider
    const { pageSize } = options
    const state = yield* Ref.make(initialState)
    const lock = yield* Effect.makeSemaphore(1)
    const locked = lock.withPermits(1)

    /** Provider failures become an empty page */
    const fetchPage = (query: ActiveQuery, offset: number) =>
      provider.query({ term: query.term, regex: query.regex, offset, max: pageSize }).pipe(
        Effect.map((page) => ({ page, failed: false })),
        Effect.catchAll((error) =>
          Effect.logWarning("Search provider query failed", {
            term: query.term,
            offset,
            reason: error.reason,
            message: error.message,
          }).pipe(Effect.as({ page: ResultPage.empty, failed: true }))
        )
      )

    const logStale = (operation: string, generation: number, offset: number) =>
      Effect.logDebug("Discarded response for a superseded query", {
        operation,
        generation,
        offset,
      })

    const setQuery = Effect.fn("PagedResultCache.setQuery")(function* (
      term: string,
      regex: boolean = false
    ) {
      yield* locked(
        Ref.update(state, (current) =>
          current.query.term === term && current.query.regex === regex
            ? current
            : {
                residentOffset: 0,
                residentRecords: [],
                query: { term, regex },
                totalCount: 0,
                generation: current.generation + 1,
              }
        )
      )
    })

    const ensure = Effect.fn("PagedResultCache.ensure")(function* (index: number) {
      if (!Number.isInteger(index) || index < 0) return Option.none<ResultRecord>()

      const snapshot = yield* locked(Ref.get(state))
      if (snapshot.query.term === "") return Option.none<ResultRecord>()

      const local = index - snapshot.residentOffset
      if (local >= 0 && local < snapshot.residentRecords.length) {
        return Option.fromNullable(snapshot.residentRecords[local])
      }

      const pageStart = pageStartFor(index, pageSize)
      const { page } = yield* fetchPage(snapshot.query, pageStart)

      const stored = yield* locked(
        Ref.modify(state, (current): [boolean, CacheState] =>
          current.generation === snapshot.generation
            ? [true, { ...current, residentOffset: pageStart, residentRecords: page.records }]
            : [false, current]
        )
      )
      if (!stored) {
        yield* logStale("ensure", snapshot.generation, pageStart)
        return Option.none<ResultRecord>()
      }

      return Option.fromNullable(page.records[index - pageStart])
    })

    const invalidate = Effect.fn("PagedResultCache.invalidate")(function* () {
      yield* locked(
        Ref.update(state, (current) => ({
          ...current,
          residentOffset: 0,
          residentRecords: [],
          generation: current.generation + 1,
        }))
      )
    })

    const search = Effect.fn("PagedResultCache.search")(function* () {
      const snapshot = yield* locked(Ref.get(state))
      if (snapshot.query.term === "") {
        yield* locked(Ref.update(state, (current) => ({ ...current, totalCount: 0 })))
        return { total: 0, failed: false, stale: false } satisfies SearchOutcome
      }

      const { page, failed } = yield* fetchPage(snapshot.query, 0)

      const stored = yield* locked(
        Ref.modify(state, (current): [boolean, CacheState] =>
          current.generation === snapshot.generation
            ? [
                true,
                {
                  ...current,
                  residentOffset: 0,
                  residentRecords: page.records,
                  totalCount: page.total,
                },
              ]
            : [false, current]
        )
      )
      if (!stored) {
        yield* logStale("search", snapshot.generation, 0)
        return { total: 0, failed, stale: true } satisfies SearchOutcome
      }

      return { total: page.total, failed, stale: false } satisfies SearchOutcome
    })

    const inspect = () =>
      Ref.get(state).pipe(
        Effect.map(
          (current): CacheSnapshot => ({
            residentOffset: current.residentOffset,
            residentCount: current.residentRecords.length,
            term: current.query.term,
            regex: current.query.regex,
            totalCount: current.totalCount,
            pageSize,
          })
        )
      )

    const cache: PagedResultCache = { setQuery, ensure, invalidate, search, inspect }
    return cache
  })
