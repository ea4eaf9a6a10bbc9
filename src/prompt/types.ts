import type { ClassificationResult } from '../classification/types.js'
import type { PiiResult } from '../detection/pii/types.js'
import type { SafetyResult } from '../detection/safety/types.js'

/**
 * Builds the prompts sent to the classification models. The pipeline
 * passes structured state in and treats the returned text as opaque.
 */
export interface PromptBuilder {
  buildFinalClassificationPrompt(
    documentText: string,
    pii: PiiResult,
    safety: SafetyResult
  ): string

  buildVerificationPrompt(documentText: string, primary: ClassificationResult): string
}
