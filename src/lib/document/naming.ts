export interface ClassReviewName {
  date: string
  community: string
  classNumber: string
}

// Path separators, reserved characters and control characters
const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g

export function sanitizeFilenameComponent(input: string): string {
  return input.trim().replace(UNSAFE_FILENAME_CHARS, '-')
}

/**
 * `{date}_classreview_{community}_{classNumber}.pdf`
 */
export function classReviewFilename({ date, community, classNumber }: ClassReviewName): string {
  return [
    sanitizeFilenameComponent(date),
    'classreview',
    sanitizeFilenameComponent(community),
    sanitizeFilenameComponent(classNumber),
  ].join('_') + '.pdf'
}
