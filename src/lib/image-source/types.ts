/**
 * Image Source Types
 *
 * An image is opened right before its page is composed, decoded into an
 * upright RGB JPEG held in memory, and dropped once the page is drawn.
 */

import type { Effect } from 'effect'

import type { ImageIoError } from '../errors'

export type ColorMode = 'rgb'

export interface DecodedImage {
  /** Path the image was read from */
  path: string
  /** Pixel width after orientation correction */
  width: number
  /** Pixel height after orientation correction */
  height: number
  colorMode: ColorMode
  /** EXIF orientation found in the file (1 when absent) */
  orientation: number
  /** JPEG re-encoding handed to the page drawer */
  jpeg: Uint8Array
}

/**
 * Rotation (clockwise, degrees) and horizontal mirror that bring a stored
 * image upright. The mirror is applied before the rotation.
 */
export interface OrientationTransform {
  rotate: 0 | 90 | 180 | 270
  flop: boolean
}

/**
 * Opens and decodes images by path.
 */
export interface ImageLoader {
  readonly load: (path: string) => Effect.Effect<DecodedImage, ImageIoError>
}
