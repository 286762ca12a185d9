/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

export interface ExtractionWarning {
  type: 'low_text' | 'low_confidence'
  message: string
}

export interface QualityMetrics {
  /** Total character count after normalization */
  charCount: number
  /** Estimated word count */
  wordCount: number
  /** Number of pages (1 for plain text) */
  pageCount: number
  /** Extraction confidence 0-1 based on text density */
  confidence: number
  /** Warnings from extraction process */
  warnings: ExtractionWarning[]
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface ExtractionResult {
  /** Extracted text, NFC-normalized UTF-8 */
  text: string
  /** Quality metrics shown alongside the analysis */
  quality: QualityMetrics
  /** Page count from source document */
  pageCount: number
  /** Document metadata if available */
  metadata: DocumentMetadata
}
