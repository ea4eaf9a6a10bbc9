import { describe, it, expect } from 'vitest'
import { normalizeDocumentContent } from '../../src/document/schema.js'
import { assembleDocumentText, extractDocumentMetadata } from '../../src/document/text.js'

describe('normalizeDocumentContent', () => {
  it('keeps a well-formed document', () => {
    const content = normalizeDocumentContent({
      pageCount: 1,
      imageCount: 1,
      hasText: true,
      isLegible: true,
      legibilityScore: 0.9,
      pages: [
        {
          pageNumber: 1,
          text: 'Hello',
          hasText: true,
          charCount: 5,
          images: [{ width: 10, height: 20, colorMode: 'RGB' }],
        },
      ],
    })

    expect(content.pageCount).toBe(1)
    expect(content.legibilityScore).toBe(0.9)
    expect(content.pages[0]).toEqual({
      pageNumber: 1,
      text: 'Hello',
      hasText: true,
      charCount: 5,
      images: [{ width: 10, height: 20, colorMode: 'RGB' }],
    })
  })

  it('derives missing fields from the pages', () => {
    const content = normalizeDocumentContent({
      pages: [
        { pageNumber: 2, text: null, images: [{ width: 1, height: 1 }] },
        { pageNumber: 1, text: 'Page one' },
      ],
    })

    expect(content.pageCount).toBe(2)
    expect(content.imageCount).toBe(1)
    expect(content.hasText).toBe(true)
    expect(content.isLegible).toBe(true)
    expect(content.legibilityScore).toBe(1)
    expect(content.pages.map((p) => p.pageNumber)).toEqual([1, 2])
    expect(content.pages[1]).toEqual({
      pageNumber: 2,
      text: '',
      hasText: false,
      charCount: 0,
      images: [{ width: 1, height: 1, colorMode: 'unknown' }],
    })
  })

  it('drops invalid and duplicate pages', () => {
    const content = normalizeDocumentContent({
      pages: [
        { pageNumber: 1, text: 'first' },
        { pageNumber: 1, text: 'duplicate' },
        { pageNumber: 0, text: 'zero' },
        'not a page',
      ],
    })

    expect(content.pages).toHaveLength(1)
    expect(content.pages[0].text).toBe('first')
  })

  it('keeps the pages when a derived field is malformed', () => {
    const content = normalizeDocumentContent({
      pageCount: '1',
      imageCount: -2,
      hasText: 'yes',
      pages: [{ pageNumber: 1, text: 'graphic violence here', charCount: 'many' }],
    })

    expect(content.pageCount).toBe(1)
    expect(content.imageCount).toBe(0)
    expect(content.hasText).toBe(true)
    expect(content.pages).toEqual([
      {
        pageNumber: 1,
        text: 'graphic violence here',
        hasText: true,
        charCount: 21,
        images: [],
      },
    ])
  })

  it('never throws on malformed input', () => {
    for (const input of [null, 42, 'text', { pages: 'nope' }]) {
      const content = normalizeDocumentContent(input)
      expect(content.pages).toEqual([])
      expect(content.hasText).toBe(false)
    }
  })
})

describe('document text', () => {
  it('joins pages with text under page headers', () => {
    const content = normalizeDocumentContent({
      pages: [
        { pageNumber: 1, text: 'Alpha' },
        { pageNumber: 2, text: '' },
        { pageNumber: 3, text: 'Gamma' },
      ],
    })

    expect(assembleDocumentText(content)).toBe(
      '--- Page 1 ---\nAlpha\n\n--- Page 3 ---\nGamma'
    )
  })

  it('extracts metadata', () => {
    const content = normalizeDocumentContent({
      isLegible: false,
      legibilityScore: 0.3,
      pages: [{ pageNumber: 1, text: 'x' }],
    })

    expect(extractDocumentMetadata(content)).toEqual({
      pageCount: 1,
      imageCount: 0,
      hasText: true,
      isLegible: false,
      legibilityScore: 0.3,
    })
  })
})
