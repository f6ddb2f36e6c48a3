/**
 * Branded primitives shared by the Effect services.
 */
import { Schema } from "effect"

/** Number of records fetched per provider call */
export const PageSize = Schema.Int.pipe(Schema.positive(), Schema.brand("PageSize"))
export type PageSize = typeof PageSize.Type

/** Total match count reported by a provider */
export const MatchCount = Schema.Int.pipe(Schema.nonNegative(), Schema.brand("MatchCount"))
export type MatchCount = typeof MatchCount.Type
