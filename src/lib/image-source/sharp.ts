/**
 * Node.js ImageLoader implementation backed by sharp.
 *
 * The file is decoded once for its metadata and once for the pixels. The
 * output is always an upright, 3-channel sRGB JPEG: alpha is flattened
 * onto white and EXIF orientation is applied, then dropped.
 */

import { Effect } from 'effect'
import sharp from 'sharp'

import { describeCause, ImageIoError } from '../errors'
import { JPEG_QUALITY } from '../layout/geometry'
import { normalizeOrientation } from './orientation'
import type { DecodedImage, ImageLoader } from './types'

const FLATTEN_BACKGROUND = { r: 255, g: 255, b: 255 }

async function decodeWithSharp(path: string): Promise<DecodedImage> {
  const metadata = await sharp(path).metadata()
  const orientation = metadata.orientation ?? 1
  const transform = normalizeOrientation(orientation)

  let pipeline = sharp(path)
  if (transform.flop) {
    pipeline = pipeline.flop()
  }
  if (transform.rotate !== 0) {
    pipeline = pipeline.rotate(transform.rotate)
  }

  const { data, info } = await pipeline
    .flatten({ background: FLATTEN_BACKGROUND })
    .toColourspace('srgb')
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer({ resolveWithObject: true })

  return {
    path,
    width: info.width,
    height: info.height,
    colorMode: 'rgb',
    orientation,
    jpeg: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  }
}

export const sharpImageLoader: ImageLoader = {
  load: path =>
    Effect.tryPromise({
      try: () => decodeWithSharp(path),
      catch: error =>
        new ImageIoError({
          message: `Could not load image ${path}: ${describeCause(error)}`,
          path,
          cause: error,
        }),
    }),
}
