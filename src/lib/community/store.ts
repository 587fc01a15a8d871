/**
 * Community Store
 *
 * A name → description mapping persisted as a YAML file. The whole file is
 * loaded once and rewritten (keys sorted) after every change. Document
 * builders never see the table, only the description resolved for a name.
 */

import { Context, Effect, Either, Layer, Ref, Schema } from 'effect'
import fs from 'fs/promises'
import YAML from 'yaml'

import {
  CommunityNotFoundError,
  CommunityStoreError,
  describeCause,
  DuplicateCommunityError,
  ValidationError,
} from '../errors'

export type CommunityEntries = ReadonlyMap<string, string>

const CommunityFile = Schema.Record({ key: Schema.String, value: Schema.String })

/**
 * Text used when a community has no stored description.
 */
export function missingDescription(name: string): string {
  return `No data for ${name}`
}

export interface CommunityStore {
  /** Community names, sorted */
  readonly list: () => Effect.Effect<string[]>

  readonly get: (name: string) => Effect.Effect<string, CommunityNotFoundError>

  /** The stored description, or a placeholder naming the community */
  readonly resolve: (name: string) => Effect.Effect<string>

  readonly add: (
    name: string,
    description: string,
  ) => Effect.Effect<void, ValidationError | DuplicateCommunityError | CommunityStoreError>

  readonly update: (
    name: string,
    description: string,
  ) => Effect.Effect<void, ValidationError | CommunityNotFoundError | CommunityStoreError>

  readonly remove: (name: string) => Effect.Effect<void, CommunityNotFoundError | CommunityStoreError>
}

type Persist = (entries: CommunityEntries) => Effect.Effect<void, CommunityStoreError>

// -----------------------------------------------------------------------------
// YAML file
// -----------------------------------------------------------------------------

/**
 * Serialise entries as YAML with keys in ascending order.
 */
export function formatCommunityFile(entries: CommunityEntries): string {
  const sorted = [...entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return YAML.stringify(Object.fromEntries(sorted))
}

/**
 * Parse YAML text into entries. An empty document is an empty store.
 */
export function parseCommunityFile(
  text: string,
  filePath?: string,
): Either.Either<CommunityEntries, CommunityStoreError> {
  let parsed: unknown
  try {
    parsed = YAML.parse(text)
  } catch (error) {
    return Either.left(
      new CommunityStoreError({
        message: `Community file is not valid YAML: ${describeCause(error)}`,
        path: filePath,
        cause: error,
      }),
    )
  }

  if (parsed === null || parsed === undefined) {
    return Either.right(new Map())
  }

  return Schema.decodeUnknownEither(CommunityFile)(parsed).pipe(
    Either.map(record => new Map(Object.entries(record))),
    Either.mapLeft(error =>
      new CommunityStoreError({
        message: 'Community file must map community names to description strings',
        path: filePath,
        cause: error,
      })
    ),
  )
}

const saveCommunityFile = (filePath: string): Persist => entries =>
  Effect.tryPromise({
    try: () => fs.writeFile(filePath, formatCommunityFile(entries), 'utf-8'),
    catch: error =>
      new CommunityStoreError({
        message: `Could not save communities to ${filePath}: ${describeCause(error)}`,
        path: filePath,
        cause: error,
      }),
  })

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

/**
 * Load the community file, creating an empty one when it does not exist.
 */
export const loadCommunityFile = (
  filePath: string,
): Effect.Effect<CommunityEntries, CommunityStoreError> =>
  Effect.gen(function*() {
    const text = yield* Effect.tryPromise({
      try: () => fs.readFile(filePath, 'utf-8'),
      catch: error => error,
    }).pipe(
      Effect.catchAll(error =>
        isMissingFile(error)
          ? Effect.succeed(null)
          : Effect.fail(
            new CommunityStoreError({
              message: `Could not read communities from ${filePath}: ${describeCause(error)}`,
              path: filePath,
              cause: error,
            }),
          )
      ),
    )

    if (text === null) {
      const empty: CommunityEntries = new Map()
      yield* saveCommunityFile(filePath)(empty)
      yield* Effect.logInfo(`Created community file ${filePath}`)
      return empty
    }

    const entries = yield* parseCommunityFile(text, filePath)
    yield* Effect.logDebug(`Loaded ${entries.size} communities from ${filePath}`)
    return entries
  })

// -----------------------------------------------------------------------------
// Service
// -----------------------------------------------------------------------------

function makeCommunityStore(ref: Ref.Ref<CommunityEntries>, persist: Persist): CommunityStore {
  const commit = (next: CommunityEntries) =>
    persist(next).pipe(Effect.zipRight(Ref.set(ref, next)))

  const requireDescription = (description: string) => {
    const trimmed = description.trim()
    return trimmed
      ? Effect.succeed(trimmed)
      : Effect.fail(new ValidationError({ message: 'Description is required', field: 'description' }))
  }

  const notFound = (name: string) =>
    new CommunityNotFoundError({ message: `Community '${name}' does not exist`, name })

  return {
    list: () => Ref.get(ref).pipe(Effect.map(entries => [...entries.keys()].sort())),

    get: name =>
      Effect.gen(function*() {
        const entries = yield* Ref.get(ref)
        const description = entries.get(name)
        if (description === undefined) {
          return yield* Effect.fail(notFound(name))
        }
        return description
      }),

    resolve: name =>
      Ref.get(ref).pipe(Effect.map(entries => entries.get(name) ?? missingDescription(name))),

    add: (name, description) =>
      Effect.gen(function*() {
        const key = name.trim()
        if (!key) {
          return yield* Effect.fail(
            new ValidationError({ message: 'Community name is required', field: 'name' }),
          )
        }
        const text = yield* requireDescription(description)
        const entries = yield* Ref.get(ref)
        if (entries.has(key)) {
          return yield* Effect.fail(
            new DuplicateCommunityError({ message: `Community '${key}' already exists`, name: key }),
          )
        }
        yield* commit(new Map(entries).set(key, text))
      }),

    update: (name, description) =>
      Effect.gen(function*() {
        const entries = yield* Ref.get(ref)
        if (!entries.has(name)) {
          return yield* Effect.fail(notFound(name))
        }
        const text = yield* requireDescription(description)
        yield* commit(new Map(entries).set(name, text))
      }),

    remove: name =>
      Effect.gen(function*() {
        const entries = yield* Ref.get(ref)
        if (!entries.has(name)) {
          return yield* Effect.fail(notFound(name))
        }
        const next = new Map(entries)
        next.delete(name)
        yield* commit(next)
      }),
  }
}

/**
 * Effect Context.Tag for the community store.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function*() {
 *   const communities = yield* CommunityStoreTag
 *   return yield* communities.resolve('Maple Street')
 * })
 *
 * program.pipe(Effect.provide(CommunityStoreTag.fromFile('communities.yaml')))
 * ```
 */
export class CommunityStoreTag extends Context.Tag('CommunityStore')<
  CommunityStoreTag,
  CommunityStore
>() {
  /**
   * Layer backed by a YAML file. Every change is written back immediately.
   */
  static readonly fromFile = (filePath: string) =>
    Layer.effect(
      CommunityStoreTag,
      Effect.gen(function*() {
        const entries = yield* loadCommunityFile(filePath)
        const ref = yield* Ref.make(entries)
        return makeCommunityStore(ref, saveCommunityFile(filePath))
      }),
    )

  /**
   * Layer held in memory only. Useful for testing.
   */
  static readonly inMemory = (seed: Record<string, string> = {}) =>
    Layer.effect(
      CommunityStoreTag,
      Effect.gen(function*() {
        const ref = yield* Ref.make<CommunityEntries>(new Map(Object.entries(seed)))
        return makeCommunityStore(ref, () => Effect.void)
      }),
    )
}
