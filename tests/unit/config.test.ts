import { describe, it } from '@effect/vitest'
import { ConfigProvider, Effect, LogLevel } from 'effect'
import { expect } from 'vitest'

import { AppConfig } from '../../src/lib/config'

const withEnv = (env: Record<string, string>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))))

describe('AppConfig', () => {
  it.effect('falls back to defaults', () =>
    Effect.gen(function*() {
      const config = yield* AppConfig
      expect(config.communitiesFile).toBe('communities.yaml')
      expect(config.outputDir).toBe('.')
      expect(config.minImages).toBe(2)
      expect(config.logLevel).toBe(LogLevel.Info)
    }).pipe(withEnv({})))

  it.effect('reads values from the environment', () =>
    Effect.gen(function*() {
      const config = yield* AppConfig
      expect(config.communitiesFile).toBe('/data/communities.yaml')
      expect(config.outputDir).toBe('/data/out')
      expect(config.minImages).toBe(3)
      expect(config.logLevel).toBe(LogLevel.Debug)
    }).pipe(
      withEnv({
        COMMUNITIES_FILE: '/data/communities.yaml',
        OUTPUT_DIR: '/data/out',
        MIN_IMAGES: '3',
        LOG_LEVEL: 'DEBUG',
      }),
    ))

  it.effect('rejects a minimum below one', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(AppConfig)
      expect(error._tag).toBe('InvalidData')
      if (error._tag === 'InvalidData') {
        expect(error.message).toBe('MIN_IMAGES must be at least 1')
      }
    }).pipe(withEnv({ MIN_IMAGES: '0' })))
})
