/**
 * Tests for the subscription registry.
 */
import { Effect } from "effect"
import { it } from "@effect/vitest"
import { describe, expect } from "vitest"
import { makeSubscriptionId, makeSubscriptionRegistry } from "../../../src/effect/services/subscription-registry"

describe("makeSubscriptionId", () => {
  it("generates distinct ids", () => {
    const first = makeSubscriptionId()
    const second = makeSubscriptionId()
    expect(first).not.toBe(second)
    expect(first.startsWith("sub_")).toBe(true)
  })
})

describe("makeSubscriptionRegistry", () => {
  it.effect("delivers values to every subscriber", () =>
    Effect.gen(function* () {
      const registry = yield* makeSubscriptionRegistry<number>()
      const a: Array<number> = []
      const b: Array<number> = []
      yield* registry.subscribe((value) => a.push(value))
      yield* registry.subscribe((value) => b.push(value * 10))

      yield* registry.notify(1)
      yield* registry.notify(2)

      expect(a).toEqual([1, 2])
      expect(b).toEqual([10, 20])
    })
  )

  it.effect("stops delivering after cleanup", () =>
    Effect.gen(function* () {
      const registry = yield* makeSubscriptionRegistry<string>()
      const seen: Array<string> = []
      const cleanup = yield* registry.subscribe((value) => seen.push(value))

      yield* registry.notify("first")
      cleanup()
      yield* registry.notify("second")

      expect(seen).toEqual(["first"])
    })
  )

  it.effect("a throwing subscriber does not stop the others", () =>
    Effect.gen(function* () {
      const registry = yield* makeSubscriptionRegistry<number>()
      const seen: Array<number> = []
      yield* registry.subscribe(() => {
        throw new Error("listener failed")
      })
      yield* registry.subscribe((value) => seen.push(value))

      yield* registry.notify(7)

      expect(seen).toEqual([7])
    })
  )
})
