/**
 * Batch annotation of PDF files.
 *
 * Unlike a build, a batch does not stop at the first bad input: each file
 * succeeds or fails on its own and the result lists both.
 */

import { Effect, Either } from 'effect'
import path from 'path'

import { type AnnotateError, ValidationError } from '../errors'
import { annotateDocument } from './annotator'
import { readDocumentFile, writeDocumentFile } from './files'

export interface BatchItemSuccess {
  input: string
  output: string
  pageCount: number
}

export interface BatchItemFailure {
  input: string
  reason: string
  tag: AnnotateError['_tag']
}

export interface BatchResult {
  attempted: number
  succeeded: BatchItemSuccess[]
  failed: BatchItemFailure[]
}

/**
 * Annotate one file into `outputDir`, keeping its file name.
 *
 * The input is never overwritten: an output path that resolves to the input
 * itself is rejected.
 */
export const annotateFile = (
  input: string,
  overlayText: string,
  outputDir: string,
): Effect.Effect<BatchItemSuccess, AnnotateError> =>
  Effect.gen(function*() {
    const output = path.join(outputDir, path.basename(input))

    if (path.resolve(output) === path.resolve(input)) {
      return yield* Effect.fail(
        new ValidationError({
          message: `Output directory would overwrite ${input} in place`,
          field: 'outputDir',
        }),
      )
    }

    const bytes = yield* readDocumentFile(input)
    const annotated = yield* annotateDocument(bytes, overlayText, path.basename(input))
    yield* writeDocumentFile(output, annotated.bytes)

    return { input, output, pageCount: annotated.pageCount }
  })

/**
 * Annotate every file in `inputs`, in order, with the same overlay text.
 *
 * Fails only when the batch itself is unusable (no inputs, or blank text).
 * Per-file failures are collected in the result.
 */
export const annotateFiles = (
  inputs: readonly string[],
  overlayText: string,
  outputDir: string,
): Effect.Effect<BatchResult, ValidationError> =>
  Effect.gen(function*() {
    if (inputs.length === 0) {
      return yield* Effect.fail(
        new ValidationError({ message: 'Select at least one PDF to annotate', field: 'inputs' }),
      )
    }
    if (!overlayText.trim()) {
      return yield* Effect.fail(
        new ValidationError({ message: 'Overlay text is required', field: 'overlayText' }),
      )
    }

    const succeeded: BatchItemSuccess[] = []
    const failed: BatchItemFailure[] = []

    for (const input of inputs) {
      const result = yield* Effect.either(annotateFile(input, overlayText, outputDir))

      if (Either.isRight(result)) {
        succeeded.push(result.right)
        yield* Effect.logInfo(`Annotated ${input} -> ${result.right.output}`)
      } else {
        const error = result.left
        failed.push({ input, reason: error.message, tag: error._tag })
        yield* Effect.logWarning(`Skipped ${input}: ${error.message}`)
      }
    }

    yield* Effect.logInfo(`Annotated ${succeeded.length} of ${inputs.length} documents`)
    return { attempted: inputs.length, succeeded, failed }
  })
