/**
 * Class Review
 *
 * The end-to-end request behind "Process Images to PDF": validate the form,
 * resolve the community text, build a header-band document and save it
 * under the class review naming convention.
 */

import { Effect } from 'effect'
import path from 'path'

import { CommunityStoreTag } from './community/store'
import { DEFAULT_MIN_IMAGES } from './config'
import { buildDocument } from './document/builder'
import { writeDocumentFile } from './document/files'
import { classReviewFilename } from './document/naming'
import { type BuildError, ValidationError } from './errors'
import { ImageLoaderTag } from './image-source'

export interface ClassReviewRequest {
  date: string
  classNumber: string
  community?: string | null
  /** Image slots in page order; empty slots are skipped */
  images: ReadonlyArray<string | null | undefined>
  outputDir: string
}

export interface ClassReviewOptions {
  minImages?: number
}

export interface ClassReviewResult {
  outputPath: string
  filename: string
  pageCount: number
  communityText: string
}

export interface ValidClassReview {
  date: string
  classNumber: string
  community: string
  images: string[]
  outputDir: string
}

/**
 * Check a request in the order the form reports problems: date, class
 * number, community, images, then output directory.
 */
export function validateClassReview(
  request: ClassReviewRequest,
  minImages: number = DEFAULT_MIN_IMAGES,
): Effect.Effect<ValidClassReview, ValidationError> {
  const date = request.date.trim()
  const classNumber = request.classNumber.trim()
  const community = request.community?.trim() ?? ''
  const images = request.images.filter((image): image is string => !!image && !!image.trim())
  const outputDir = request.outputDir.trim()

  const reject = (message: string, field: string) =>
    Effect.fail(new ValidationError({ message, field }))

  if (!date) return reject('Please enter a date', 'date')
  if (!classNumber) return reject('Please enter a class number', 'classNumber')
  if (!community) return reject('Please select a community', 'community')
  if (images.length < minImages) {
    return reject(
      `Please select ${minImages} image${minImages === 1 ? '' : 's'}`,
      'images',
    )
  }
  if (!outputDir) return reject('Please select an output directory', 'outputDir')

  return Effect.succeed({ date, classNumber, community, images, outputDir })
}

/**
 * Build and save a class review document.
 *
 * The file is written only after every page has been composed.
 */
export const createClassReview = (
  request: ClassReviewRequest,
  options: ClassReviewOptions = {},
): Effect.Effect<ClassReviewResult, BuildError, ImageLoaderTag | CommunityStoreTag> =>
  Effect.gen(function*() {
    const valid = yield* validateClassReview(request, options.minImages)
    const communities = yield* CommunityStoreTag
    const communityText = yield* communities.resolve(valid.community)

    const filename = classReviewFilename(valid)
    const outputPath = path.join(valid.outputDir, filename)

    yield* Effect.logInfo(`Building ${filename} from ${valid.images.length} images`)
    const document = yield* buildDocument(valid.images, {
      variant: 'header-band',
      overlayText: communityText,
      title: path.basename(filename, '.pdf'),
    })
    yield* writeDocumentFile(outputPath, document.bytes)
    yield* Effect.logInfo(`PDF created: ${outputPath}`)

    return { outputPath, filename, pageCount: document.pageCount, communityText }
  })
