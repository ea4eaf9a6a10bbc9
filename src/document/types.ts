/**
 * Metadata of an image found on a page.
 */
export interface ImageRef {
  width: number
  height: number
  /** Color mode as reported by ingestion, e.g. RGB, L, CMYK */
  colorMode: string
}

/**
 * One page of extracted content.
 */
export interface Page {
  /** 1-based page number */
  pageNumber: number
  /** Extracted text (possibly empty) */
  text: string
  hasText: boolean
  charCount: number
  images: ImageRef[]
}

/**
 * Normalized document content handed over by ingestion.
 * Read-only inside the pipeline.
 */
export interface DocumentContent {
  pageCount: number
  imageCount: number
  hasText: boolean
  isLegible: boolean
  /** Legibility score in [0, 1] */
  legibilityScore: number
  pages: Page[]
}

/**
 * Document metadata reported with every classification outcome.
 */
export interface DocumentMetadata {
  pageCount: number
  imageCount: number
  hasText: boolean
  isLegible: boolean
  legibilityScore: number
}
