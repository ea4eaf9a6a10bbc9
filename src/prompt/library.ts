import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { CLASSIFICATION_CATEGORIES } from '../classification/types.js'

const CategoryDefinitionSchema = z.object({
  description: z.string(),
  keywords: z.array(z.string()).default([]),
})

export const PromptLibrarySchema = z.object({
  version: z.number().int().positive().default(1),
  systemPrompt: z.string(),
  categories: z
    .record(CategoryDefinitionSchema)
    .refine(
      (categories) => CLASSIFICATION_CATEGORIES.every((name) => name in categories),
      { message: `categories must define ${CLASSIFICATION_CATEGORIES.join(', ')}` }
    ),
  finalClassificationTask: z.string(),
  verificationTask: z.string(),
  verificationInstructions: z.string(),
  citationInstructions: z.string(),
  responseFormat: z.string(),
})

export type PromptLibrary = z.infer<typeof PromptLibrarySchema>

/**
 * Location of the bundled library (same relative path from src/ and dist/).
 */
export const DEFAULT_PROMPT_LIBRARY_PATH = fileURLToPath(
  new URL('../../prompts/library.json', import.meta.url)
)

/**
 * Load and validate a prompt library file.
 */
export function loadPromptLibrary(filePath: string = DEFAULT_PROMPT_LIBRARY_PATH): PromptLibrary {
  const content = readFileSync(filePath, 'utf-8')
  return PromptLibrarySchema.parse(JSON.parse(content))
}

/**
 * Replace {name} placeholders. Placeholders without a value are left as they are.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? values[name] : placeholder
  )
}
