/**
 * @fileoverview Document extraction module
 *
 * Lightweight barrel export safe for bundling. unpdf is loaded with a
 * dynamic import inside extractPdf, so importing this barrel stays cheap.
 *
 * @module lib/document-extraction
 */

export type {
  ExtractionResult,
  QualityMetrics,
  ExtractionWarning,
  DocumentMetadata,
} from './types'

export { extractPdf } from './pdf-extractor'

export { validateExtractionQuality, MIN_TEXT_LENGTH } from './validators'

export {
  extractDocument,
  isSupportedMimeType,
  SUPPORTED_MIME_TYPES,
  type SupportedMimeType,
  type ExtractDocumentOptions,
} from './extract-document'
