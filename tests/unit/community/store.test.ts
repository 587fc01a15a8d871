import { describe, it } from '@effect/vitest'
import { Effect, Either } from 'effect'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, expect } from 'vitest'

import {
  CommunityStoreTag,
  formatCommunityFile,
  parseCommunityFile,
} from '../../../src/lib/community/store'

// =============================================================================
// Test Helpers
// =============================================================================

const SEED = {
  'Maple Street': 'Welcome to Maple Street',
  'Birch Lane': 'Birch Lane meets on Tuesdays',
}

const withSeed = <A, E>(program: Effect.Effect<A, E, CommunityStoreTag>) =>
  program.pipe(Effect.provide(CommunityStoreTag.inMemory(SEED)))

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'communities-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

// =============================================================================
// Tests
// =============================================================================

describe('CommunityStore', () => {
  describe('in memory', () => {
    it.effect('lists names in sorted order', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          expect(yield* communities.list()).toEqual(['Birch Lane', 'Maple Street'])
        }),
      ))

    it.effect('resolves a stored description', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          expect(yield* communities.resolve('Maple Street')).toBe('Welcome to Maple Street')
        }),
      ))

    it.effect('resolves an unknown community to a placeholder', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          expect(yield* communities.resolve('Oak Hill')).toBe('No data for Oak Hill')
        }),
      ))

    it.effect('fails get for an unknown community', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          const error = yield* Effect.flip(communities.get('Oak Hill'))
          expect(error._tag).toBe('CommunityNotFoundError')
          expect(error.message).toBe("Community 'Oak Hill' does not exist")
        }),
      ))

    it.effect('adds a trimmed entry', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          yield* communities.add('  Oak Hill ', ' Oak Hill meets at noon ')
          expect(yield* communities.get('Oak Hill')).toBe('Oak Hill meets at noon')
        }),
      ))

    it.effect('rejects a duplicate name', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          const error = yield* Effect.flip(communities.add('Maple Street', 'Another text'))
          expect(error._tag).toBe('DuplicateCommunityError')
          expect(error.message).toBe("Community 'Maple Street' already exists")
          expect(yield* communities.get('Maple Street')).toBe('Welcome to Maple Street')
        }),
      ))

    it.effect('requires a name and a description', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          const noName = yield* Effect.flip(communities.add('  ', 'Text'))
          const noDescription = yield* Effect.flip(communities.add('Oak Hill', '   '))

          expect(noName.message).toBe('Community name is required')
          expect(noDescription.message).toBe('Description is required')
          expect(yield* communities.list()).toEqual(['Birch Lane', 'Maple Street'])
        }),
      ))

    it.effect('updates an existing description', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          yield* communities.update('Birch Lane', 'Moved to Thursdays')
          expect(yield* communities.get('Birch Lane')).toBe('Moved to Thursdays')
        }),
      ))

    it.effect('fails to update an unknown community', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          const error = yield* Effect.flip(communities.update('Oak Hill', 'Text'))
          expect(error._tag).toBe('CommunityNotFoundError')
        }),
      ))

    it.effect('removes an entry', () =>
      withSeed(
        Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          yield* communities.remove('Birch Lane')
          expect(yield* communities.list()).toEqual(['Maple Street'])
          const error = yield* Effect.flip(communities.remove('Birch Lane'))
          expect(error._tag).toBe('CommunityNotFoundError')
        }),
      ))
  })

  describe('YAML file', () => {
    it('formats entries with sorted keys', () => {
      const entries = new Map([['Maple Street', 'Second'], ['Birch Lane', 'First']])
      expect(formatCommunityFile(entries)).toBe('Birch Lane: First\nMaple Street: Second\n')
    })

    it('parses an empty document as an empty store', () => {
      const result = parseCommunityFile('')
      expect(Either.isRight(result) && result.right.size).toBe(0)
    })

    it('rejects invalid YAML', () => {
      const result = parseCommunityFile('Maple Street: [unterminated', 'communities.yaml')
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe('CommunityStoreError')
        expect(result.left.path).toBe('communities.yaml')
      }
    })

    it('rejects descriptions that are not strings', () => {
      const result = parseCommunityFile('Maple Street: 3\n')
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.message).toBe('Community file must map community names to description strings')
      }
    })

    it.effect('creates a missing file and persists changes', () =>
      Effect.gen(function*() {
        const filePath = path.join(dir, 'communities.yaml')

        yield* Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          expect(yield* communities.list()).toEqual([])
          expect(yield* Effect.promise(() => fs.readFile(filePath, 'utf-8'))).toBe('{}\n')

          yield* communities.add('Maple Street', 'Welcome')
          yield* communities.add('Birch Lane', 'Hello')
        }).pipe(Effect.provide(CommunityStoreTag.fromFile(filePath)))

        expect(yield* Effect.promise(() => fs.readFile(filePath, 'utf-8'))).toBe(
          'Birch Lane: Hello\nMaple Street: Welcome\n',
        )

        const reloaded = yield* Effect.gen(function*() {
          const communities = yield* CommunityStoreTag
          return yield* communities.get('Birch Lane')
        }).pipe(Effect.provide(CommunityStoreTag.fromFile(filePath)))
        expect(reloaded).toBe('Hello')
      }))

    it.effect('leaves an unreadable file untouched', () =>
      Effect.gen(function*() {
        const filePath = path.join(dir, 'communities.yaml')
        yield* Effect.promise(() => fs.writeFile(filePath, 'Maple Street: [unterminated', 'utf-8'))

        const error = yield* Effect.flip(
          Effect.gen(function*() {
            return yield* CommunityStoreTag
          }).pipe(Effect.provide(CommunityStoreTag.fromFile(filePath))),
        )

        expect(error._tag).toBe('CommunityStoreError')
        expect(yield* Effect.promise(() => fs.readFile(filePath, 'utf-8'))).toBe('Maple Street: [unterminated')
      }))
  })
})
