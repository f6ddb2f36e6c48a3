/**
 * Tests for QueryDictionary lookup and expansion.
 * The migemo engine is replaced by a tab-separated table so dictionary files
 * can be written by hand.
 */
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { Effect, Option } from "effect"
import { it, layer } from "@effect/vitest"
import { afterEach, beforeEach, describe, expect, vi } from "vitest"
import {
  DICTIONARY_FILE,
  QueryDictionary,
  dictionaryCandidates,
  loadMigemo,
} from "../../../src/effect/services/QueryDictionary"

vi.mock("jsmigemo", () => ({
  CompactDictionary: class {
    readonly lines: ReadonlyArray<string>
    constructor(buffer: ArrayBuffer) {
      this.lines = new TextDecoder().decode(buffer).split("\n")
    }
  },
  Migemo: class {
    private readonly entries = new Map<string, string>()
    setDict(dict: { readonly lines: ReadonlyArray<string> }) {
      for (const line of dict.lines) {
        const [word, pattern] = line.split("\t")
        if (word && pattern) this.entries.set(word, pattern)
      }
    }
    query(text: string) {
      return this.entries.get(text) ?? text
    }
  },
}))

describe("dictionaryCandidates", () => {
  it("looks in the working directory before the install directory", () => {
    expect(dictionaryCandidates("/work", "/opt/everyfind")).toEqual([
      path.join("/work", DICTIONARY_FILE),
      path.join("/opt/everyfind", DICTIONARY_FILE),
    ])
  })
})

describe("QueryDictionary.fromCandidates", () => {
  let workDir = ""
  let installDir = ""

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "everyfind-dict-work-"))
    installDir = fs.mkdtempSync(path.join(os.tmpdir(), "everyfind-dict-install-"))
  })

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true })
    fs.rmSync(installDir, { recursive: true, force: true })
  })

  const expand = (text: string) =>
    QueryDictionary.pipe(
      Effect.flatMap((dictionary) => dictionary.expand(text)),
      Effect.provide(QueryDictionary.fromCandidates(dictionaryCandidates(workDir, installDir)))
    )

  it.effect("passes input through when no dictionary exists", () =>
    Effect.gen(function* () {
      expect(Option.isNone(yield* expand("kyou"))).toBe(true)
    })
  )

  it.effect("falls back to the install directory", () =>
    Effect.gen(function* () {
      fs.writeFileSync(path.join(installDir, DICTIONARY_FILE), "kyou\t(kyou|今日)\n")
      expect(yield* expand("kyou")).toEqual(Option.some("(kyou|今日)"))
      expect(yield* expand("asu")).toEqual(Option.some("asu"))
    })
  )

  it.effect("prefers the dictionary in the working directory", () =>
    Effect.gen(function* () {
      fs.writeFileSync(path.join(workDir, DICTIONARY_FILE), "kyou\t(kyou|京)\n")
      fs.writeFileSync(path.join(installDir, DICTIONARY_FILE), "kyou\t(kyou|今日)\n")
      expect(yield* expand("kyou")).toEqual(Option.some("(kyou|京)"))
    })
  )

  it.effect("skips a candidate that cannot be read", () =>
    Effect.gen(function* () {
      fs.mkdirSync(path.join(workDir, DICTIONARY_FILE))
      fs.writeFileSync(path.join(installDir, DICTIONARY_FILE), "kyou\t(kyou|今日)\n")
      expect(yield* expand("kyou")).toEqual(Option.some("(kyou|今日)"))
    })
  )

  it.effect("reports the path of an unreadable dictionary", () =>
    Effect.gen(function* () {
      const file = path.join(workDir, DICTIONARY_FILE)
      fs.mkdirSync(file)
      const error = yield* Effect.flip(loadMigemo(file))
      expect(error._tag).toBe("DictionaryError")
      expect(error.path).toBe(file)
    })
  )
})

layer(QueryDictionary.fromMap(new Map([["kyou", "(kyou|今日)"]])))("QueryDictionary.fromMap", (it) => {
  it.effect("looks up expansions in a fixed table", () =>
    Effect.gen(function* () {
      const dictionary = yield* QueryDictionary
      expect(yield* dictionary.expand("kyou")).toEqual(Option.some("(kyou|今日)"))
      expect(Option.isNone(yield* dictionary.expand("asu"))).toBe(true)
    })
  )
})
