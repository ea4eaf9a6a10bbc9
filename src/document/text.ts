import type { DocumentContent, DocumentMetadata } from './types.js'

/**
 * Join the text of every page that has any, each under a page header.
 */
export function assembleDocumentText(content: DocumentContent): string {
  return content.pages
    .filter((page) => page.text)
    .map((page) => `--- Page ${page.pageNumber} ---\n${page.text}`)
    .join('\n\n')
}

/**
 * Metadata reported alongside classification outcomes.
 */
export function extractDocumentMetadata(content: DocumentContent): DocumentMetadata {
  return {
    pageCount: content.pageCount,
    imageCount: content.imageCount,
    hasText: content.hasText,
    isLegible: content.isLegible,
    legibilityScore: content.legibilityScore,
  }
}
