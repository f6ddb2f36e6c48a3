/**
 * QueryDictionary service: expands romaji input into a regular expression
 * that also matches its kana and kanji readings.
 */
import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { Context, Effect, Layer, Option } from "effect"
import { CompactDictionary, Migemo } from "jsmigemo"
import { DictionaryError } from "../errors"

/** File name of the migemo compact dictionary */
export const DICTIONARY_FILE = "migemo-compact-dict"

/** Directory the package is installed in */
const installDir = () => path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..")

/** Places searched for the dictionary, in order */
export const dictionaryCandidates = (
  workingDir: string = process.cwd(),
  packageDir: string = installDir()
): ReadonlyArray<string> => [
  path.join(workingDir, DICTIONARY_FILE),
  path.join(packageDir, DICTIONARY_FILE),
]

export interface QueryExpander {
  readonly query: (text: string) => string
}

/** Read a compact dictionary into a migemo engine */
export const loadMigemo = (file: string) =>
  Effect.try({
    try: (): QueryExpander => {
      const contents = fs.readFileSync(file)
      const bytes = new ArrayBuffer(contents.byteLength)
      new Uint8Array(bytes).set(contents)
      const migemo = new Migemo()
      migemo.setDict(new CompactDictionary(bytes))
      return migemo
    },
    catch: (cause) => new DictionaryError({ path: file, cause }),
  })

/** Load the first candidate that exists and can be read */
const findDictionary = (candidates: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    for (const file of candidates) {
      if (!fs.existsSync(file)) continue
      const loaded = yield* loadMigemo(file).pipe(
        Effect.map(Option.some),
        Effect.catchTag("DictionaryError", (error) =>
          Effect.logWarning("Skipping unreadable migemo dictionary", { path: error.path, error }).pipe(
            Effect.as(Option.none<QueryExpander>())
          )
        )
      )
      if (Option.isSome(loaded)) {
        yield* Effect.logDebug("Loaded migemo dictionary", { path: file })
        return loaded
      }
    }
    yield* Effect.logDebug("No migemo dictionary found", { candidates })
    return Option.none<QueryExpander>()
  })

const expandWith = (expander: Option.Option<QueryExpander>) => (text: string) =>
  Effect.sync(() =>
    Option.flatMap(expander, (engine) => {
      const expanded = engine.query(text)
      return expanded === "" ? Option.none() : Option.some(expanded)
    })
  )

export class QueryDictionary extends Context.Tag("@everyfind/QueryDictionary")<
  QueryDictionary,
  {
    /** `None` when no dictionary is loaded or the text has no expansion */
    readonly expand: (text: string) => Effect.Effect<Option.Option<string>>
  }
>() {
  /** Dictionary found among `candidates`; without one, input passes through unchanged */
  static readonly fromCandidates = (candidates: ReadonlyArray<string>) =>
    Layer.effect(
      QueryDictionary,
      findDictionary(candidates).pipe(
        Effect.map((expander) => QueryDictionary.of({ expand: expandWith(expander) }))
      )
    )

  /** Production layer - searches the working directory, then the install directory */
  static readonly layer = Layer.suspend(() => QueryDictionary.fromCandidates(dictionaryCandidates()))

  /** Dictionary backed by a fixed lookup table */
  static readonly fromMap = (entries: ReadonlyMap<string, string>) =>
    Layer.succeed(QueryDictionary, {
      expand: (text: string) => Effect.succeed(Option.fromNullable(entries.get(text))),
    })

  /** Test layer - no dictionary */
  static readonly testLayer = Layer.succeed(QueryDictionary, {
    expand: () => Effect.succeed(Option.none()),
  })
}
