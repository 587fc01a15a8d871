/**
 * Page geometry and image placement.
 *
 * All values are PDF points with the origin at the bottom-left corner of the
 * page, the same convention pdf-lib draws with.
 */

// Page Layout Constants (US Letter 8.5 x 11)
export const PAGE = {
  WIDTH: 612,
  HEIGHT: 792,
  HEADER_BAND_HEIGHT: 100,
  // Side margin around the image when a header band is present
  IMAGE_SIDE_MARGIN: 20,
} as const

// Typography
export const FONT_SIZES = {
  body: 12,
  caption: 8,
} as const

// Header band text placement, measured from the left and top page edges
export const TEXT_LAYOUT = {
  LEFT_MARGIN: 10,
  TOP_OFFSET: 20,
  LINE_PITCH: 15,
  GAP_PITCH: 8,
  CAPTION_RIGHT_OFFSET: 80,
  CAPTION_TOP_OFFSET: 15,
} as const

export const JPEG_QUALITY = 95

export interface PageGeometry {
  width: number
  height: number
  headerBandHeight: number
}

export const LETTER_GEOMETRY: PageGeometry = {
  width: PAGE.WIDTH,
  height: PAGE.HEIGHT,
  headerBandHeight: PAGE.HEADER_BAND_HEIGHT,
}

/**
 * Geometry for a page of arbitrary size that carries the standard band.
 */
export function geometryFor(width: number, height: number): PageGeometry {
  return { width, height, headerBandHeight: PAGE.HEADER_BAND_HEIGHT }
}

export interface Size {
  width: number
  height: number
}

export interface Rect extends Size {
  x: number
  y: number
}

/**
 * Where an image lands once scaled to fit a rectangle.
 */
export interface ScaledPlacement extends Rect {
  scale: number
}

export type VerticalAnchor = 'bottom' | 'center'

/**
 * Scale `image` uniformly to fit inside `area` and position it there.
 *
 * The image is centered horizontally. Vertically it either sits on the
 * bottom edge of the area or is centered.
 */
export function computePlacement(
  image: Size,
  area: Rect,
  anchor: VerticalAnchor,
): ScaledPlacement {
  if (image.width <= 0 || image.height <= 0) {
    throw new RangeError(`Image dimensions must be positive, got ${image.width}x${image.height}`)
  }

  const scale = Math.min(area.width / image.width, area.height / image.height)
  const width = image.width * scale
  const height = image.height * scale

  return {
    scale,
    width,
    height,
    x: area.x + (area.width - width) / 2,
    y: anchor === 'bottom' ? area.y : area.y + (area.height - height) / 2,
  }
}

/**
 * The rectangle an image may occupy on a page.
 *
 * With a header band the image area loses the band at the top and a side
 * margin on each edge; without one it is the whole page.
 */
export function imageArea(geometry: PageGeometry, withHeaderBand: boolean): Rect {
  if (!withHeaderBand) {
    return { x: 0, y: 0, width: geometry.width, height: geometry.height }
  }
  return {
    x: PAGE.IMAGE_SIDE_MARGIN,
    y: 0,
    width: geometry.width - 2 * PAGE.IMAGE_SIDE_MARGIN,
    height: geometry.height - geometry.headerBandHeight,
  }
}
