/**
 * Listener registry for session state changes.
 * Cleanup is synchronous so UI code can unsubscribe from its own teardown hooks.
 */

import { Effect, Schema } from "effect"

// =============================================================================
// Types
// =============================================================================

export const SubscriptionId = Schema.String.pipe(Schema.brand("SubscriptionId"))
export type SubscriptionId = typeof SubscriptionId.Type

let nextSubscription = 0

export const makeSubscriptionId = (): SubscriptionId =>
  SubscriptionId.make(`sub_${Date.now()}_${(nextSubscription++).toString(36)}`)

export interface Subscription<T> {
  readonly id: SubscriptionId
  readonly callback: (value: T) => void
}

// =============================================================================
// SubscriptionRegistry
// =============================================================================

export const makeSubscriptionRegistry = <T>() =>
  Effect.sync(() => {
    const subscriptions = new Map<SubscriptionId, Subscription<T>>()

    /** Returns a synchronous unsubscribe function */
    const subscribe = (callback: (value: T) => void) =>
      Effect.sync(() => {
        const id = makeSubscriptionId()
        subscriptions.set(id, { id, callback })
        return () => {
          subscriptions.delete(id)
        }
      })

    /**
     * Deliver `value` to every subscriber. A throwing callback is logged and
     * does not stop delivery to the rest.
     */
    const notify = (value: T) =>
      Effect.forEach(
        Array.from(subscriptions.values()),
        (sub) =>
          Effect.try(() => sub.callback(value)).pipe(
            Effect.catchAll((error) =>
              Effect.logWarning("Subscription callback error", { error })
            )
          ),
        { discard: true }
      )

    return {
      subscribe,
      notify,
    }
  })

export type SubscriptionRegistry<T> = Effect.Effect.Success<
  ReturnType<typeof makeSubscriptionRegistry<T>>
>
