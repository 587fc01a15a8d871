/**
 * Document Builder
 *
 * Turns an ordered deck of images into a new PDF, one Letter page per image.
 * Images are decoded one at a time, right before their page is composed.
 */

import { Effect } from 'effect'
import { PDFDocument } from 'pdf-lib'

import { bodyMeasure, embedOverlayFont, renderPagePlan, toEncodableText } from '../compositor/render'
import { planPage } from '../compositor/page-plan'
import type { PlacementVariant } from '../compositor/types'
import { describeCause, DocumentIoError, ImageIoError, ValidationError } from '../errors'
import { ImageLoaderTag } from '../image-source'
import { PAGE } from '../layout/geometry'
import { writeDocumentFile } from './files'

export interface BuildOptions {
  variant: PlacementVariant
  /** Header band text. Ignored for `full-bleed`. */
  overlayText?: string
  /** Written to the PDF's Title entry */
  title?: string
}

export interface BuiltDocument {
  bytes: Uint8Array
  pageCount: number
}

/**
 * Build a PDF from `imagePaths`, in the given order.
 *
 * Fails on the first image that cannot be decoded; nothing is returned for
 * the pages built before it.
 *
 * @example
 * ```typescript
 * const program = buildDocument(['front.jpg', 'back.jpg'], {
 *   variant: 'header-band',
 *   overlayText: 'Welcome to Maple Street',
 * }).pipe(Effect.provide(ImageLoaderTag.Sharp))
 *
 * const { bytes } = await Effect.runPromise(program)
 * ```
 */
export const buildDocument = (
  imagePaths: readonly string[],
  options: BuildOptions,
): Effect.Effect<BuiltDocument, ValidationError | ImageIoError, ImageLoaderTag> =>
  Effect.gen(function*() {
    if (imagePaths.length === 0) {
      return yield* Effect.fail(
        new ValidationError({
          message: 'At least one image is required to build a document',
          field: 'images',
        }),
      )
    }

    const loader = yield* ImageLoaderTag
    const doc = yield* Effect.promise(() => PDFDocument.create())
    if (options.title) {
      doc.setTitle(options.title)
    }

    const font = yield* Effect.promise(() => embedOverlayFont(doc))
    const measure = bodyMeasure(font)
    const overlayText = options.variant === 'header-band' && options.overlayText !== undefined
      ? toEncodableText(options.overlayText, font)
      : undefined

    const pageCount = imagePaths.length
    for (const [index, imagePath] of imagePaths.entries()) {
      const decoded = yield* loader.load(imagePath)
      const image = yield* Effect.tryPromise({
        try: () => doc.embedJpg(decoded.jpeg),
        catch: error =>
          new ImageIoError({
            message: `Could not embed image ${imagePath}: ${describeCause(error)}`,
            path: imagePath,
            cause: error,
          }),
      })

      const plan = planPage(
        {
          pageIndex: index + 1,
          pageCount,
          variant: options.variant,
          image: { width: decoded.width, height: decoded.height },
          overlayText,
        },
        measure,
      )
      const page = doc.addPage([PAGE.WIDTH, PAGE.HEIGHT])
      renderPagePlan(page, plan, { font, image })
    }

    const bytes = yield* Effect.promise(() => doc.save())
    return { bytes, pageCount: doc.getPageCount() }
  })

/**
 * Build a PDF and save it to `destination`. Nothing is written unless every
 * page was built.
 */
export const buildDocumentFile = (
  imagePaths: readonly string[],
  options: BuildOptions,
  destination: string,
): Effect.Effect<BuiltDocument & { path: string }, ValidationError | ImageIoError | DocumentIoError, ImageLoaderTag> =>
  buildDocument(imagePaths, options).pipe(
    Effect.flatMap(document =>
      writeDocumentFile(destination, document.bytes).pipe(
        Effect.map(path => ({ ...document, path })),
      )
    ),
  )
