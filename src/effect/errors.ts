/**
 * Domain errors with Schema.TaggedError for type-safe, serializable errors.
 */
import { Schema } from "effect"

// =============================================================================
// Search Provider Errors
// =============================================================================

/** A provider query could not be answered */
export class SearchProviderError extends Schema.TaggedError<SearchProviderError>()(
  "SearchProviderError",
  {
    reason: Schema.Literal("unreachable", "bad-status", "malformed"),
    term: Schema.String,
    offset: Schema.Number,
    message: Schema.String,
    cause: Schema.optional(Schema.Defect),
  }
) {}

/** The index file behind the in-memory provider could not be loaded */
export class IndexFileError extends Schema.TaggedError<IndexFileError>()(
  "IndexFileError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}

// =============================================================================
// Action Errors
// =============================================================================

/** Opening a file or its folder failed */
export class ShellActionError extends Schema.TaggedError<ShellActionError>()(
  "ShellActionError",
  {
    action: Schema.Literal("open", "reveal"),
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** Clipboard operation failed */
export class ClipboardError extends Schema.TaggedError<ClipboardError>()(
  "ClipboardError",
  {
    operation: Schema.Literal("write"),
    cause: Schema.Defect,
  }
) {}

// =============================================================================
// Dictionary Errors
// =============================================================================

/** A migemo dictionary file exists but could not be loaded */
export class DictionaryError extends Schema.TaggedError<DictionaryError>()(
  "DictionaryError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}
