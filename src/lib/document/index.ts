export { type AnnotatedDocument, annotateDocument } from './annotator'
export {
  annotateFile,
  annotateFiles,
  type BatchItemFailure,
  type BatchItemSuccess,
  type BatchResult,
} from './batch'
export { type BuildOptions, type BuiltDocument, buildDocument, buildDocumentFile } from './builder'
export { swapWithNext, swapWithPrevious } from './deck'
export { readDocumentFile, writeDocumentFile } from './files'
export { classReviewFilename, type ClassReviewName, sanitizeFilenameComponent } from './naming'
