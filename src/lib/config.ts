/**
 * Application configuration, read from environment variables through
 * Effect's Config module. Entry points load `.env` before reading it.
 */

import { Config, LogLevel } from 'effect'

export const DEFAULT_MIN_IMAGES = 2

export interface AppConfig {
  /** YAML file holding community descriptions */
  communitiesFile: string
  /** Default destination directory for generated documents */
  outputDir: string
  /** Images a class review needs before it can be built */
  minImages: number
  logLevel: LogLevel.LogLevel
}

export const AppConfig: Config.Config<AppConfig> = Config.all({
  communitiesFile: Config.string('COMMUNITIES_FILE').pipe(Config.withDefault('communities.yaml')),
  outputDir: Config.string('OUTPUT_DIR').pipe(Config.withDefault('.')),
  minImages: Config.integer('MIN_IMAGES').pipe(
    Config.withDefault(DEFAULT_MIN_IMAGES),
    Config.validate({
      message: 'MIN_IMAGES must be at least 1',
      validation: (n: number) => n >= 1,
    }),
  ),
  logLevel: Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info)),
})
