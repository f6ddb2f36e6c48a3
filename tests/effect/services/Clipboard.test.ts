/**
 * Tests for the Clipboard test layers.
 */
import { Effect } from "effect"
import { it } from "@effect/vitest"
import { describe, expect } from "vitest"
import { Clipboard } from "../../../src/effect/services/Clipboard"

describe("Clipboard.recording", () => {
  it.effect("records every path written, in order", () => {
    const writes: Array<string> = []
    return Effect.gen(function* () {
      const clipboard = yield* Clipboard
      yield* clipboard.write("C:\\docs\\first.txt")
      yield* clipboard.write("C:\\docs\\second.txt")
      expect(writes).toEqual(["C:\\docs\\first.txt", "C:\\docs\\second.txt"])
    }).pipe(Effect.provide(Clipboard.recording(writes)))
  })
})

describe("Clipboard.testLayer", () => {
  it.effect("accepts writes", () =>
    Effect.gen(function* () {
      const clipboard = yield* Clipboard
      yield* clipboard.write("C:\\docs\\first.txt")
    }).pipe(Effect.provide(Clipboard.testLayer))
  )
})
