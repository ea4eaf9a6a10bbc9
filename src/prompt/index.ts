export type { PromptBuilder } from './types.js'
export {
  PromptLibrarySchema,
  DEFAULT_PROMPT_LIBRARY_PATH,
  loadPromptLibrary,
  fillTemplate,
  type PromptLibrary,
} from './library.js'
export { LibraryPromptBuilder } from './builder.js'
