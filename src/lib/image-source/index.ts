/**
 * Image Source module.
 *
 * Exposes the ImageLoader as an Effect service so document builders can be
 * run against sharp in production and against a stub in tests.
 */

import { Context, Layer } from 'effect'

import { sharpImageLoader } from './sharp'
import type { ImageLoader } from './types'

/**
 * Context Tag for ImageLoader dependency injection.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function*() {
 *   const loader = yield* ImageLoaderTag
 *   const image = yield* loader.load('photo.jpg')
 *   return [image.width, image.height]
 * })
 *
 * program.pipe(Effect.provide(ImageLoaderTag.Sharp))
 * ```
 */
export class ImageLoaderTag extends Context.Tag('ImageLoader')<ImageLoaderTag, ImageLoader>() {
  /** Layer decoding images from disk with sharp. */
  static readonly Sharp = Layer.succeed(ImageLoaderTag, sharpImageLoader)

  /** Layer around any loader, e.g. a stub in tests. */
  static readonly make = (loader: ImageLoader) => Layer.succeed(ImageLoaderTag, loader)
}

export { normalizeOrientation } from './orientation'
export { sharpImageLoader } from './sharp'
export * from './types'
