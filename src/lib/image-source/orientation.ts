import type { OrientationTransform } from './types'

const TRANSFORMS: Record<number, OrientationTransform> = {
  1: { rotate: 0, flop: false },
  2: { rotate: 0, flop: true },
  3: { rotate: 180, flop: false },
  4: { rotate: 180, flop: true },
  5: { rotate: 270, flop: true },
  6: { rotate: 90, flop: false },
  7: { rotate: 90, flop: true },
  8: { rotate: 270, flop: false },
}

/**
 * Map an EXIF orientation tag (1-8) to the transform that displays the
 * image upright. Missing or out-of-range tags mean "already upright".
 */
export function normalizeOrientation(orientation: number | undefined): OrientationTransform {
  return (orientation !== undefined && TRANSFORMS[orientation]) || TRANSFORMS[1]
}
