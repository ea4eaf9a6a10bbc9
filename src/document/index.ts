export type { DocumentContent, DocumentMetadata, Page, ImageRef } from './types.js'
export {
  DocumentContentSchema,
  PageSchema,
  ImageRefSchema,
  normalizeDocumentContent,
} from './schema.js'
export { assembleDocumentText, extractDocumentMetadata } from './text.js'
