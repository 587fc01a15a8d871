/**
 * Page Compositor Types
 *
 * A page is described by a PageSpec, turned into a PagePlan (a flat list of
 * draw operations in page coordinates), and the plan is then rendered onto
 * a pdf-lib page.
 */

import type { Size } from '../layout/geometry'

/**
 * `header-band` reserves a text band at the top of the page and places the
 * image below it. `full-bleed` centers the image over the whole page and
 * draws no text.
 */
export type PlacementVariant = 'header-band' | 'full-bleed'

export const PLACEMENT_VARIANTS: readonly PlacementVariant[] = ['header-band', 'full-bleed']

export function isPlacementVariant(value: string): value is PlacementVariant {
  return PLACEMENT_VARIANTS.some(variant => variant === value)
}

export interface PageSpec {
  /** 1-indexed position of the page in its document */
  pageIndex: number
  /** Total number of pages, shown in the "Page i of N" caption */
  pageCount: number
  variant: PlacementVariant
  /** Pixel size of the image to draw, if the page carries one */
  image?: Size
  /** Overlay text for the header band */
  overlayText?: string
}

export interface RgbColor {
  r: number
  g: number
  b: number
}

export const WHITE: RgbColor = { r: 1, g: 1, b: 1 }
export const BLACK: RgbColor = { r: 0, g: 0, b: 0 }

export type DrawOp =
  | {
    kind: 'rect'
    x: number
    y: number
    width: number
    height: number
    color: RgbColor
  }
  | {
    kind: 'text'
    text: string
    x: number
    y: number
    size: number
    color: RgbColor
  }
  | {
    kind: 'image'
    x: number
    y: number
    width: number
    height: number
  }

export interface PagePlan {
  width: number
  height: number
  ops: DrawOp[]
}
