/**
 * Error types for document composition, annotation and the community store.
 *
 * Each failure mode has a dedicated error type using Effect's
 * Schema.TaggedError pattern so callers can match on `_tag` exhaustively.
 */

import { Schema } from 'effect'

// =============================================================================
// Input Validation
// =============================================================================

/**
 * A request was rejected before any drawing began.
 * `field` names the offending input when there is one.
 */
export class ValidationError
  extends Schema.TaggedError<ValidationError>()('ValidationError', {
    message: Schema.String,
    field: Schema.optional(Schema.String),
  })
{}

// =============================================================================
// I/O
// =============================================================================

/**
 * An image could not be opened or decoded.
 */
export class ImageIoError
  extends Schema.TaggedError<ImageIoError>()('ImageIoError', {
    message: Schema.String,
    path: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  })
{}

/**
 * A document file could not be read, or its destination could not be written.
 */
export class DocumentIoError
  extends Schema.TaggedError<DocumentIoError>()('DocumentIoError', {
    message: Schema.String,
    path: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  })
{}

// =============================================================================
// Document Format
// =============================================================================

/**
 * Input bytes are not a usable paginated document (unparsable, encrypted,
 * or without pages).
 */
export class DocumentFormatError
  extends Schema.TaggedError<DocumentFormatError>()('DocumentFormatError', {
    message: Schema.String,
    source: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Unknown),
  })
{}

// =============================================================================
// Community Store
// =============================================================================

export class CommunityStoreError
  extends Schema.TaggedError<CommunityStoreError>()('CommunityStoreError', {
    message: Schema.String,
    path: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Unknown),
  })
{}

export class CommunityNotFoundError
  extends Schema.TaggedError<CommunityNotFoundError>()('CommunityNotFoundError', {
    message: Schema.String,
    name: Schema.String,
  })
{}

export class DuplicateCommunityError
  extends Schema.TaggedError<DuplicateCommunityError>()('DuplicateCommunityError', {
    message: Schema.String,
    name: Schema.String,
  })
{}

// =============================================================================
// Union Types
// =============================================================================

/**
 * Failures of a single build. Any of them aborts the whole document.
 */
export type BuildError = ValidationError | ImageIoError | DocumentIoError

/**
 * Failures of annotating one document.
 *
 * @example
 * ```typescript
 * pipe(
 *   annotateFile(input, text, outputDir),
 *   Effect.catchTags({
 *     DocumentFormatError: e => reportCorrupt(e),
 *     DocumentIoError: e => reportUnwritable(e),
 *   })
 * )
 * ```
 */
export type AnnotateError = ValidationError | DocumentFormatError | DocumentIoError

/**
 * Render an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message
  }
  return String(cause)
}
