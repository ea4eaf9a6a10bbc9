import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { SafetyTaxonomy } from './types.js'

const CategoryDefinitionSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  severity: z.enum(['critical', 'high', 'medium', 'low']),
  description: z.string(),
})

export const SafetyTaxonomySchema = z.object({
  categories: z.object({
    child_safety: CategoryDefinitionSchema,
    hate_speech: CategoryDefinitionSchema,
    violence: CategoryDefinitionSchema,
    exploitative: CategoryDefinitionSchema,
    criminal: CategoryDefinitionSchema,
    cyber_threat: CategoryDefinitionSchema,
    political_misinfo: CategoryDefinitionSchema,
  }),
  safeContexts: z.array(z.string().min(1)),
})

/**
 * Location of the bundled taxonomy (same relative path from src/ and dist/).
 */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../../data/safety-taxonomy.json', import.meta.url)
)

/**
 * Load and validate a taxonomy file.
 */
export function loadSafetyTaxonomy(filePath: string = DEFAULT_TAXONOMY_PATH): SafetyTaxonomy {
  const content = readFileSync(filePath, 'utf-8')
  return SafetyTaxonomySchema.parse(JSON.parse(content))
}

let defaultTaxonomy: SafetyTaxonomy | null = null

/**
 * Bundled taxonomy, loaded once.
 */
export function getDefaultTaxonomy(): SafetyTaxonomy {
  if (!defaultTaxonomy) {
    defaultTaxonomy = loadSafetyTaxonomy()
  }
  return defaultTaxonomy
}
