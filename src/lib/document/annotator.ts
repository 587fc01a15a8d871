/**
 * Document Annotator
 *
 * Stamps a header band onto every page of an existing PDF. The band is
 * drawn on a separate transparent layer page of the same size, and the
 * layer is then drawn over the original page, so the page's own content
 * stays untouched underneath.
 */

import { Effect } from 'effect'
import { PDFDocument } from 'pdf-lib'

import { planPage } from '../compositor/page-plan'
import { bodyMeasure, embedOverlayFont, renderPagePlan, toEncodableText } from '../compositor/render'
import { describeCause, DocumentFormatError } from '../errors'
import { geometryFor } from '../layout/geometry'

export interface AnnotatedDocument {
  bytes: Uint8Array
  pageCount: number
}

const malformed = (source?: string) => (error: unknown) =>
  new DocumentFormatError({
    message: `${source ?? 'Input'} is not a valid PDF document: ${describeCause(error)}`,
    source,
    cause: error,
  })

const loadDocument = (input: Uint8Array, source?: string) =>
  Effect.tryPromise({
    try: () => PDFDocument.load(input, { updateMetadata: false }),
    catch: malformed(source),
  })

/**
 * Overlay `overlayText` and a "Page i of N" caption onto every page of
 * `input`. N is the input's own page count. The band is placed against each
 * page's visible area (its CropBox, or MediaBox when there is none).
 *
 * pdf-lib loads some damaged files lazily, so the page tree, page boxes and
 * the final merge can each still reject the input; all of these fail with
 * `DocumentFormatError`.
 *
 * @param source - name of the input, used in error messages
 */
export const annotateDocument = (
  input: Uint8Array,
  overlayText: string,
  source?: string,
): Effect.Effect<AnnotatedDocument, DocumentFormatError> =>
  Effect.gen(function*() {
    const doc = yield* loadDocument(input, source)
    const pages = yield* Effect.try({
      try: () => doc.getPages().map(page => ({ page, box: page.getCropBox() })),
      catch: malformed(source),
    })
    const pageCount = pages.length

    if (pageCount === 0) {
      return yield* Effect.fail(
        new DocumentFormatError({
          message: `${source ?? 'Input'} has no pages`,
          source,
        }),
      )
    }

    const layer = yield* Effect.promise(() => PDFDocument.create())
    const font = yield* Effect.promise(() => embedOverlayFont(layer))
    const measure = bodyMeasure(font)
    const text = toEncodableText(overlayText, font)

    for (const [index, { box }] of pages.entries()) {
      const layerPage = layer.addPage([box.width, box.height])
      const plan = planPage(
        { pageIndex: index + 1, pageCount, variant: 'header-band', overlayText: text },
        measure,
        geometryFor(box.width, box.height),
      )
      renderPagePlan(layerPage, plan, { font })
    }

    // Fonts are only written out on save, so the layer is serialised before embedding
    const layerBytes = yield* Effect.promise(() => layer.save())
    const overlays = yield* Effect.tryPromise({
      try: () => doc.embedPdf(layerBytes, layer.getPageIndices()),
      catch: malformed(source),
    })
    yield* Effect.try({
      try: () =>
        pages.forEach(({ page, box }, index) => {
          page.drawPage(overlays[index], { x: box.x, y: box.y })
        }),
      catch: malformed(source),
    })

    const bytes = yield* Effect.tryPromise({
      try: () => doc.save(),
      catch: error =>
        new DocumentFormatError({
          message: `${source ?? 'Input'} could not be rewritten: ${describeCause(error)}`,
          source,
          cause: error,
        }),
    })
    return { bytes, pageCount }
  })
