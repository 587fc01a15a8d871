/**
 * Page planning: geometry and text layout for one page, with no drawing.
 */

import {
  computePlacement,
  FONT_SIZES,
  imageArea,
  LETTER_GEOMETRY,
  type PageGeometry,
  TEXT_LAYOUT,
} from '../layout/geometry'
import { type TextMeasure, wrapText, type WrappedLine } from '../layout/text-wrap'
import { BLACK, type DrawOp, type PagePlan, type PageSpec, WHITE } from './types'

/**
 * Overlay text after wrapping, with the baseline of every drawn line.
 */
export interface TextBlock {
  text: string
  lines: WrappedLine[]
  baselines: Array<{ text: string; y: number }>
}

/**
 * Wrap overlay text to the band width and assign baselines.
 *
 * The cursor starts TOP_OFFSET below the top edge and moves down by
 * LINE_PITCH after each line and GAP_PITCH after each gap.
 */
export function layoutTextBlock(
  text: string,
  geometry: PageGeometry,
  measure: TextMeasure,
): TextBlock {
  const maxWidth = geometry.width - 2 * TEXT_LAYOUT.LEFT_MARGIN
  const lines = wrapText(text, maxWidth, measure)
  const baselines: TextBlock['baselines'] = []

  let y = geometry.height - TEXT_LAYOUT.TOP_OFFSET
  for (const line of lines) {
    if (line.kind === 'gap') {
      y -= TEXT_LAYOUT.GAP_PITCH
    } else {
      baselines.push({ text: line.text, y })
      y -= TEXT_LAYOUT.LINE_PITCH
    }
  }

  return { text, lines, baselines }
}

export function pageCaption(pageIndex: number, pageCount: number): string {
  return `Page ${pageIndex} of ${pageCount}`
}

/**
 * Header band operations: background, wrapped overlay text and caption.
 */
function headerBandOps(
  spec: PageSpec,
  geometry: PageGeometry,
  measure: TextMeasure,
): DrawOp[] {
  const ops: DrawOp[] = [
    {
      kind: 'rect',
      x: 0,
      y: geometry.height - geometry.headerBandHeight,
      width: geometry.width,
      height: geometry.headerBandHeight,
      color: WHITE,
    },
  ]

  if (spec.overlayText !== undefined) {
    const block = layoutTextBlock(spec.overlayText, geometry, measure)
    for (const { text, y } of block.baselines) {
      ops.push({
        kind: 'text',
        text,
        x: TEXT_LAYOUT.LEFT_MARGIN,
        y,
        size: FONT_SIZES.body,
        color: BLACK,
      })
    }
  }

  ops.push({
    kind: 'text',
    text: pageCaption(spec.pageIndex, spec.pageCount),
    x: geometry.width - TEXT_LAYOUT.CAPTION_RIGHT_OFFSET,
    y: geometry.height - TEXT_LAYOUT.CAPTION_TOP_OFFSET,
    size: FONT_SIZES.caption,
    color: BLACK,
  })

  return ops
}

/**
 * Plan one page.
 *
 * @param measure - body-font measurement used for wrapping the overlay text
 */
export function planPage(
  spec: PageSpec,
  measure: TextMeasure,
  geometry: PageGeometry = LETTER_GEOMETRY,
): PagePlan {
  const withBand = spec.variant === 'header-band'
  const ops: DrawOp[] = withBand ? headerBandOps(spec, geometry, measure) : []

  if (spec.image) {
    const placement = computePlacement(
      spec.image,
      imageArea(geometry, withBand),
      withBand ? 'bottom' : 'center',
    )
    ops.push({
      kind: 'image',
      x: placement.x,
      y: placement.y,
      width: placement.width,
      height: placement.height,
    })
  }

  return { width: geometry.width, height: geometry.height, ops }
}
