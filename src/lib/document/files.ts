/**
 * Reading and writing document files.
 *
 * Writes go to a uniquely named temporary file beside the destination and
 * are renamed into place once complete. The temporary file is a scoped
 * resource: it is removed whether the write succeeds or fails, so a failed
 * write never leaves a truncated document at the destination.
 */

import { randomUUID } from 'crypto'
import { Effect } from 'effect'
import fs from 'fs/promises'
import path from 'path'

import { describeCause, DocumentIoError } from '../errors'

export const readDocumentFile = (filePath: string): Effect.Effect<Uint8Array, DocumentIoError> =>
  Effect.tryPromise({
    try: () => fs.readFile(filePath),
    catch: error =>
      new DocumentIoError({
        message: `Could not read ${filePath}: ${describeCause(error)}`,
        path: filePath,
        cause: error,
      }),
  }).pipe(Effect.map(buffer => new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)))

const temporaryPathFor = (destination: string) =>
  Effect.acquireRelease(
    Effect.sync(() =>
      path.join(
        path.dirname(destination),
        `.${path.basename(destination)}.${randomUUID()}.tmp`,
      )
    ),
    tempPath =>
      Effect.tryPromise(() => fs.rm(tempPath, { force: true })).pipe(
        Effect.catchAll(error =>
          Effect.logWarning(`Could not remove temporary file ${tempPath}`, error)
        ),
      ),
  )

/**
 * Write `bytes` to `destination`, replacing any existing file only after the
 * new content is fully on disk.
 *
 * @returns the destination path
 */
export const writeDocumentFile = (
  destination: string,
  bytes: Uint8Array,
): Effect.Effect<string, DocumentIoError> =>
  Effect.scoped(
    Effect.gen(function*() {
      const tempPath = yield* temporaryPathFor(destination)
      const fail = (error: unknown) =>
        new DocumentIoError({
          message: `Could not write ${destination}: ${describeCause(error)}`,
          path: destination,
          cause: error,
        })

      yield* Effect.tryPromise({
        try: () => fs.writeFile(tempPath, bytes, { flag: 'wx' }),
        catch: fail,
      })
      yield* Effect.tryPromise({
        try: () => fs.rename(tempPath, destination),
        catch: fail,
      })

      return destination
    }),
  )
