import { z } from 'zod'
import type { DocumentContent, Page } from './types.js'

export const ImageRefSchema = z.object({
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  colorMode: z.string().default('unknown'),
})

/**
 * Page schema. Fields that ingestion may omit degrade to empty values.
 */
export const PageSchema = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string().nullish().transform((text) => text ?? ''),
  hasText: z.boolean().optional().catch(undefined),
  charCount: z.number().int().nonnegative().optional().catch(undefined),
  images: z.array(ImageRefSchema).catch([]),
})

export const DocumentContentSchema = z.object({
  // Bad derived fields are recomputed from the pages instead
  pageCount: z.number().int().nonnegative().optional().catch(undefined),
  imageCount: z.number().int().nonnegative().optional().catch(undefined),
  hasText: z.boolean().optional().catch(undefined),
  isLegible: z.boolean().catch(true),
  legibilityScore: z.number().min(0).max(1).catch(1),
  pages: z.array(z.unknown()).catch([]),
})

/**
 * Coerce ingestion output into a valid document.
 *
 * Malformed input never throws: invalid pages are dropped, missing text
 * becomes '', and derived counts are recomputed when absent.
 */
export function normalizeDocumentContent(input: unknown): DocumentContent {
  const parsed = DocumentContentSchema.safeParse(input)
  const raw = parsed.success ? parsed.data : DocumentContentSchema.parse({})

  const pages: Page[] = []
  const seen = new Set<number>()
  for (const candidate of raw.pages) {
    const page = PageSchema.safeParse(candidate)
    if (!page.success || seen.has(page.data.pageNumber)) continue
    seen.add(page.data.pageNumber)

    const text = page.data.text
    pages.push({
      pageNumber: page.data.pageNumber,
      text,
      hasText: page.data.hasText ?? text.trim().length > 0,
      charCount: page.data.charCount ?? text.length,
      images: page.data.images,
    })
  }
  pages.sort((a, b) => a.pageNumber - b.pageNumber)

  const imageCount = pages.reduce((sum, page) => sum + page.images.length, 0)

  return {
    pageCount: raw.pageCount ?? pages.length,
    imageCount: raw.imageCount ?? imageCount,
    hasText: raw.hasText ?? pages.some((page) => page.hasText),
    isLegible: raw.isLegible,
    legibilityScore: raw.legibilityScore,
    pages,
  }
}
