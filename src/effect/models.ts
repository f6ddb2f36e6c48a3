/**
 * Domain models using Schema.Class for validation and serialization.
 */
import { Schema } from "effect"
import { MatchCount } from "./types"

// =============================================================================
// Result Models
// =============================================================================

/** One matched filesystem entry as reported by a search provider */
export class ResultRecord extends Schema.Class<ResultRecord>("ResultRecord")({
  name: Schema.String,
  /** Parent directory, without the name */
  path: Schema.String,
  size: Schema.Number.pipe(Schema.nonNegative()),
  /** 100-ns ticks since 1601-01-01 UTC */
  modifiedTimestamp: Schema.BigIntFromSelf,
  /** Marker-delimited name; empty when the provider sent no highlight */
  highlightedName: Schema.String,
  highlightedPath: Schema.String,
  isFolder: Schema.Boolean,
}) {
  /** Path and name joined with the separator the path already uses */
  get fullPath(): string {
    if (this.path === "") return this.name
    const separator = this.path.includes("\\") && !this.path.includes("/") ? "\\" : "/"
    return this.path.endsWith(separator)
      ? `${this.path}${this.name}`
      : `${this.path}${separator}${this.name}`
  }
}

/** One page of records plus the provider's total for the term */
export class ResultPage extends Schema.Class<ResultPage>("ResultPage")({
  records: Schema.Array(ResultRecord),
  total: MatchCount,
}) {
  static readonly empty = ResultPage.make({ records: [], total: MatchCount.make(0) })
}

// =============================================================================
// Index File Models
// =============================================================================

/** Entry of a JSON index file searched by the in-memory provider */
export class IndexEntry extends Schema.Class<IndexEntry>("IndexEntry")({
  name: Schema.String,
  path: Schema.String,
  size: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 0 }),
  /** FILETIME ticks as a decimal string */
  modified: Schema.optionalWith(Schema.BigInt, { default: () => 0n }),
  isFolder: Schema.optionalWith(Schema.Boolean, { default: () => false }),
}) {}

export const IndexFile = Schema.Array(IndexEntry)
