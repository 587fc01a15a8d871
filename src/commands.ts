/**
 * CLI commands.
 *
 *   build      --out FILE [--variant header-band|full-bleed] [--text T | --community C] IMAGE...
 *   review     --date D --class N --community C [--out-dir DIR] IMAGE...
 *   annotate   (--text T | --community C) [--out-dir DIR] PDF...
 *   communities list | show NAME | add NAME DESCRIPTION | update NAME DESCRIPTION | remove NAME
 *
 * Only commands that look a community up open the community file.
 */

import { type ConfigError, Effect, type Layer, Logger } from 'effect'
import { parseArgs } from 'util'

import {
  annotateFiles,
  AppConfig,
  type BuildError,
  buildDocumentFile,
  type CommunityNotFoundError,
  type CommunityStoreError,
  CommunityStoreTag,
  createClassReview,
  type DuplicateCommunityError,
  ImageLoaderTag,
  isPlacementVariant,
  type PlacementVariant,
  ValidationError,
} from './lib'

export const USAGE = `Usage:
  cli build --out FILE [--variant header-band|full-bleed] [--text TEXT | --community NAME] IMAGE...
  cli review --date DATE --class NUMBER --community NAME [--out-dir DIR] IMAGE...
  cli annotate (--text TEXT | --community NAME) [--out-dir DIR] PDF...
  cli communities list | show NAME | add NAME DESCRIPTION | update NAME DESCRIPTION | remove NAME`

const OPTIONS = {
  out: { type: 'string' },
  'out-dir': { type: 'string' },
  variant: { type: 'string' },
  text: { type: 'string' },
  community: { type: 'string' },
  date: { type: 'string' },
  class: { type: 'string' },
} as const

export type CommandError =
  | BuildError
  | CommunityStoreError
  | CommunityNotFoundError
  | DuplicateCommunityError
  | ConfigError.ConfigError

export interface CommandOutcome {
  /** False when the command ran but some of its items failed */
  ok: boolean
}

const done: CommandOutcome = { ok: true }

const usageError = (message: string) =>
  Effect.fail(new ValidationError({ message: `${message}\n\n${USAGE}` }))

const parse = (argv: string[]) =>
  Effect.try({
    try: () => parseArgs({ args: argv, options: OPTIONS, allowPositionals: true }),
    catch: error =>
      new ValidationError({
        message: `${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`,
      }),
  })

/**
 * Overlay text from --text, or looked up from --community. The community
 * file is opened only in the second case.
 */
const overlayTextFrom = (
  values: { text?: string; community?: string },
  communities: Layer.Layer<CommunityStoreTag, CommunityStoreError>,
): Effect.Effect<string | undefined, CommunityStoreError> => {
  if (values.text !== undefined) {
    return Effect.succeed(values.text)
  }
  const name = values.community
  if (name === undefined) {
    return Effect.succeed(undefined)
  }
  return Effect.gen(function*() {
    const store = yield* CommunityStoreTag
    return yield* store.resolve(name)
  }).pipe(Effect.provide(communities))
}

const communitiesCommand = ([action, name, description]: string[]) =>
  Effect.gen(function*() {
    const communities = yield* CommunityStoreTag

    switch (action) {
      case 'list': {
        const names = yield* communities.list()
        console.log(names.length > 0 ? names.join('\n') : '(no communities)')
        console.log(`Total communities: ${names.length}`)
        return done
      }
      case 'show':
        if (!name) return yield* usageError('communities show needs NAME')
        console.log(yield* communities.get(name))
        return done
      case 'add':
        if (name === undefined || description === undefined) {
          return yield* usageError('communities add needs NAME and DESCRIPTION')
        }
        yield* communities.add(name, description)
        console.log(`Added community '${name.trim()}'`)
        return done
      case 'update':
        if (name === undefined || description === undefined) {
          return yield* usageError('communities update needs NAME and DESCRIPTION')
        }
        yield* communities.update(name, description)
        console.log(`Updated community '${name}'`)
        return done
      case 'remove':
        if (!name) return yield* usageError('communities remove needs NAME')
        yield* communities.remove(name)
        console.log(`Deleted community '${name}'`)
        return done
      default:
        return yield* usageError(`Unknown communities action "${action ?? ''}"`)
    }
  })

/**
 * Run one command line (without the program name).
 *
 * Settings come from `AppConfig`; the log level applies to the whole run.
 */
export const runCommand = (argv: string[]): Effect.Effect<CommandOutcome, CommandError> =>
  Effect.gen(function*() {
    const appConfig = yield* AppConfig
    const { values, positionals } = yield* parse(argv)
    const [command, ...rest] = positionals
    const communities = CommunityStoreTag.fromFile(appConfig.communitiesFile)

    const run: Effect.Effect<CommandOutcome, CommandError, ImageLoaderTag> = Effect.gen(function*() {
      switch (command) {
        case 'build': {
          if (!values.out) {
            return yield* usageError('build needs --out')
          }
          const variant = values.variant ?? 'header-band'
          if (!isPlacementVariant(variant)) {
            return yield* usageError(`Unknown variant "${variant}"`)
          }
          const placement: PlacementVariant = variant
          const overlayText = yield* overlayTextFrom(values, communities)
          const result = yield* buildDocumentFile(rest, { variant: placement, overlayText }, values.out)
          console.log(`PDF created: ${result.path} (${result.pageCount} pages)`)
          return done
        }

        case 'review': {
          const result = yield* createClassReview(
            {
              date: values.date ?? '',
              classNumber: values.class ?? '',
              community: values.community,
              images: rest,
              outputDir: values['out-dir'] ?? appConfig.outputDir,
            },
            { minImages: appConfig.minImages },
          ).pipe(Effect.provide(communities))
          console.log(`PDF created: ${result.outputPath}`)
          return done
        }

        case 'annotate': {
          const overlayText = yield* overlayTextFrom(values, communities)
          if (overlayText === undefined) {
            return yield* usageError('annotate needs --text or --community')
          }
          const result = yield* annotateFiles(rest, overlayText, values['out-dir'] ?? appConfig.outputDir)
          for (const item of result.succeeded) {
            console.log(`✓ ${item.input} -> ${item.output}`)
          }
          for (const item of result.failed) {
            console.error(`✗ ${item.input}: ${item.reason}`)
          }
          console.log(`Processed ${result.succeeded.length} of ${result.attempted} PDFs`)
          return { ok: result.failed.length === 0 }
        }

        case 'communities':
          return yield* communitiesCommand(rest).pipe(Effect.provide(communities))

        default:
          return yield* usageError(command ? `Unknown command "${command}"` : 'No command given')
      }
    })

    return yield* run.pipe(
      Effect.provide(ImageLoaderTag.Sharp),
      Logger.withMinimumLogLevel(appConfig.logLevel),
    )
  })
