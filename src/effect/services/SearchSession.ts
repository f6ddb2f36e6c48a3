/**
 * SearchSession service: owns the input text, the search options, the
 * debounce timer and the paged cache, and turns UI events into searches and
 * context actions.
 */
import { Context, Data, Duration, Effect, Fiber, Layer, Option, Ref } from "effect"
import { AppConfig } from "../Config"
import type { ClipboardError, ShellActionError } from "../errors"
import type { ResultRecord } from "../models"
import { Clipboard } from "./Clipboard"
import { QueryDictionary } from "./QueryDictionary"
import { SearchProvider } from "./SearchProvider"
import { ShellActions } from "./ShellActions"
import { makePagedResultCache, type CacheSnapshot } from "./PagedResultCache"
import { makeSubscriptionRegistry } from "./subscription-registry"
import { cellText as displayCellText, type CellText, type DisplayColumn } from "../../core/display-cells"
import { formatWithCommas } from "../../core/format"
import {
  searchOptionsReducer,
  usesRegexQuery,
  type SearchOptions,
  type SearchOptionsAction,
} from "../../core/operations/search-options"
import { layoutText, type MeasureText, type TextLayout } from "../../core/text-layout"

// =============================================================================
// Events
// =============================================================================

export type SearchEvent = Data.TaggedEnum<{
  InputChanged: { readonly text: string }
  ToggleRegex: {}
  ToggleMigemo: {}
  SetShellContextMenu: { readonly enabled: boolean }
  OpenItem: { readonly index: number }
  ItemActivated: { readonly index: number }
  RevealItem: { readonly index: number }
  CopyItemPath: { readonly index: number }
}>

export const SearchEvent = Data.taggedEnum<SearchEvent>()

// =============================================================================
// State
// =============================================================================

export const APP_TITLE = "everyfind"
export const READY_STATUS = "Ready"

export interface SessionState {
  readonly inputText: string
  readonly options: SearchOptions
  readonly itemCount: number
  readonly status: string
  readonly title: string
  /** The last search failed; `itemCount` is 0 because of the failure, not a miss */
  readonly lastSearchFailed: boolean
}

export const statusText = (count: number): string => `${formatWithCommas(count)} items found`

export const titleText = (inputText: string): string =>
  inputText === "" ? APP_TITLE : `${inputText} - ${APP_TITLE}`

export interface CellLayoutOptions {
  readonly widthBudget: number
  readonly measure: MeasureText
  readonly ellipsisWidth: number
  readonly selected?: boolean
}

export interface SearchSessionShape {
  readonly dispatch: (event: SearchEvent) => Effect.Effect<void>
  readonly searchNow: () => Effect.Effect<void>
  /** Wait for an armed search timer, if any, to fire and finish */
  readonly awaitPendingSearch: () => Effect.Effect<void>
  /** Wait for forked open/reveal/copy actions to finish */
  readonly awaitActions: () => Effect.Effect<void>
  readonly row: (index: number) => Effect.Effect<Option.Option<ResultRecord>>
  readonly cellText: (index: number, column: DisplayColumn) => Effect.Effect<Option.Option<CellText>>
  readonly layoutCell: (
    index: number,
    column: DisplayColumn,
    options: CellLayoutOptions
  ) => Effect.Effect<Option.Option<TextLayout>>
  readonly state: () => Effect.Effect<SessionState>
  readonly subscribe: (listener: (state: SessionState) => void) => Effect.Effect<() => void>
  readonly inspectCache: () => Effect.Effect<CacheSnapshot>
}

// =============================================================================
// Session
// =============================================================================

export const makeSearchSession = Effect.gen(function* () {
  const config = yield* AppConfig
  const dictionary = yield* QueryDictionary
  const shell = yield* ShellActions
  const clipboard = yield* Clipboard
  const cache = yield* makePagedResultCache({ pageSize: config.pageSize })
  const registry = yield* makeSubscriptionRegistry<SessionState>()

  const stateRef = yield* Ref.make<SessionState>({
    inputText: "",
    options: config.initialOptions,
    itemCount: 0,
    status: READY_STATUS,
    title: APP_TITLE,
    lastSearchFailed: false,
  })
  const pendingSearch = yield* Ref.make(Option.none<Fiber.RuntimeFiber<void>>())
  const runningActions = yield* Ref.make<ReadonlyArray<Fiber.RuntimeFiber<void>>>([])
  const timerLock = yield* Effect.makeSemaphore(1)

  const updateState = (f: (state: SessionState) => SessionState) =>
    Ref.updateAndGet(stateRef, f).pipe(Effect.flatMap(registry.notify))

  // ---------------------------------------------------------------------------
  // Searching
  // ---------------------------------------------------------------------------

  const runSearch = Effect.fn("SearchSession.runSearch")(function* () {
    const current = yield* Ref.get(stateRef)
    const text = current.inputText

    if (text === "") {
      yield* cache.setQuery("", false)
      yield* cache.search()
      yield* updateState((state) => ({
        ...state,
        itemCount: 0,
        status: READY_STATUS,
        title: APP_TITLE,
        lastSearchFailed: false,
      }))
      return
    }

    const regex = usesRegexQuery(current.options)
    const term = current.options.migemo
      ? Option.getOrElse(yield* dictionary.expand(text), () => text)
      : text

    yield* cache.setQuery(term, regex)
    const outcome = yield* cache.search()
    if (outcome.stale) return

    yield* updateState((state) => ({
      ...state,
      itemCount: outcome.total,
      status: statusText(outcome.total),
      title: titleText(text),
      lastSearchFailed: outcome.failed,
    }))
  })

  /** Cancel the armed timer and start a new one */
  const armSearch = (delayMs: number) =>
    timerLock.withPermits(1)(
      Effect.gen(function* () {
        const previous = yield* Ref.get(pendingSearch)
        if (Option.isSome(previous)) {
          yield* Fiber.interrupt(previous.value)
        }
        const fiber = yield* Effect.forkDaemon(
          Effect.sleep(Duration.millis(delayMs)).pipe(Effect.zipRight(runSearch()))
        )
        yield* Ref.set(pendingSearch, Option.some(fiber))
      })
    )

  /** Supersedes an armed timer */
  const searchNow = () =>
    timerLock
      .withPermits(1)(
        Ref.getAndSet(pendingSearch, Option.none()).pipe(
          Effect.flatMap(
            Option.match({
              onNone: () => Effect.void,
              onSome: (fiber) => Fiber.interrupt(fiber),
            })
          )
        )
      )
      .pipe(Effect.zipRight(runSearch()))

  const awaitPendingSearch = () =>
    Ref.get(pendingSearch).pipe(
      Effect.flatMap(
        Option.match({
          onNone: () => Effect.void,
          onSome: (fiber) => Effect.asVoid(Fiber.await(fiber)),
        })
      )
    )

  const applyOption = (action: SearchOptionsAction) =>
    updateState((state) => ({ ...state, options: searchOptionsReducer(state.options, action) }))

  // ---------------------------------------------------------------------------
  // Rows
  // ---------------------------------------------------------------------------

  const row = (index: number) =>
    Ref.get(stateRef).pipe(
      Effect.flatMap((state) =>
        index >= 0 && index < state.itemCount
          ? cache.ensure(index)
          : Effect.succeed(Option.none<ResultRecord>())
      )
    )

  const cellText = (index: number, column: DisplayColumn) =>
    row(index).pipe(Effect.map(Option.map((record) => displayCellText(record, column))))

  const layoutCell = (index: number, column: DisplayColumn, options: CellLayoutOptions) =>
    cellText(index, column).pipe(
      Effect.map(
        Option.map((cell) =>
          layoutText({
            text: cell.text,
            ranges: cell.ranges,
            widthBudget: options.widthBudget,
            measure: options.measure,
            ellipsisWidth: options.ellipsisWidth,
            selected: options.selected,
          })
        )
      )
    )

  // ---------------------------------------------------------------------------
  // Context actions
  // ---------------------------------------------------------------------------

  /** Copies the path out of the record, then runs the action on its own fiber */
  const runItemAction = (
    name: string,
    index: number,
    action: (fullPath: string) => Effect.Effect<void, ShellActionError | ClipboardError>
  ) =>
    Effect.gen(function* () {
      const record = yield* row(index)
      if (Option.isNone(record)) {
        yield* Effect.logDebug("No record for item action", { action: name, index })
        return
      }
      const fullPath = record.value.fullPath
      const fiber = yield* Effect.forkDaemon(
        action(fullPath).pipe(
          Effect.catchAll((error) =>
            Effect.logError("Item action failed", { action: name, path: fullPath, error })
          )
        )
      )
      yield* Ref.update(runningActions, (fibers) => [
        ...fibers.filter((running) => running.unsafePoll() === null),
        fiber,
      ])
    })

  const awaitActions = () =>
    Ref.getAndSet(runningActions, []).pipe(
      Effect.flatMap((fibers) => Effect.forEach(fibers, (fiber) => Fiber.await(fiber), { discard: true }))
    )

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  const dispatch = (event: SearchEvent): Effect.Effect<void> =>
    SearchEvent.$match(event, {
      InputChanged: ({ text }) =>
        updateState((state) => ({ ...state, inputText: text })).pipe(
          Effect.zipRight(armSearch(config.debounceMs))
        ),
      ToggleRegex: () =>
        applyOption({ type: "TOGGLE_REGEX" }).pipe(
          Effect.zipRight(armSearch(config.retriggerDelayMs))
        ),
      ToggleMigemo: () =>
        applyOption({ type: "TOGGLE_MIGEMO" }).pipe(
          Effect.zipRight(armSearch(config.retriggerDelayMs))
        ),
      SetShellContextMenu: ({ enabled }) => applyOption({ type: "SET_SHELL_CONTEXT_MENU", enabled }),
      OpenItem: ({ index }) => runItemAction("open", index, shell.open),
      ItemActivated: ({ index }) => runItemAction("open", index, shell.open),
      RevealItem: ({ index }) => runItemAction("reveal", index, shell.reveal),
      CopyItemPath: ({ index }) => runItemAction("copy", index, clipboard.write),
    })

  return SearchSession.of({
    dispatch,
    searchNow,
    awaitPendingSearch,
    awaitActions,
    row,
    cellText,
    layoutCell,
    state: () => Ref.get(stateRef),
    subscribe: registry.subscribe,
    inspectCache: cache.inspect,
  })
})

// =============================================================================
// SearchSession Service
// =============================================================================

export class SearchSession extends Context.Tag("@everyfind/SearchSession")<
  SearchSession,
  SearchSessionShape
>() {
  static readonly layer = Layer.effect(SearchSession, makeSearchSession)
}
