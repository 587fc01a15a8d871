/**
 * class-review-pdf
 *
 * Composes images into paginated PDFs with an optional community-text header
 * band, and stamps the same band onto existing PDFs.
 *
 * Everything that touches the file system or an image decoder is an Effect
 * program; layout and wrapping are plain functions.
 */

// Layout
export * from './layout/geometry'
export { type TextMeasure, wrapText, type WrappedLine } from './layout/text-wrap'

// Page composition
export { layoutTextBlock, pageCaption, planPage, type TextBlock } from './compositor/page-plan'
export {
  bodyMeasure,
  embedOverlayFont,
  type PageResources,
  renderPagePlan,
  toEncodableText,
} from './compositor/render'
export * from './compositor/types'

// Images
export * from './image-source'

// Documents
export * from './document'

// Communities
export {
  type CommunityEntries,
  type CommunityStore,
  CommunityStoreTag,
  formatCommunityFile,
  loadCommunityFile,
  missingDescription,
  parseCommunityFile,
} from './community/store'

// Requests
export {
  type ClassReviewOptions,
  type ClassReviewRequest,
  type ClassReviewResult,
  createClassReview,
  validateClassReview,
  type ValidClassReview,
} from './review'

export { AppConfig, DEFAULT_MIN_IMAGES } from './config'
export * from './errors'
