import type { ClassificationResult } from '../classification/types.js'
import type { PiiResult } from '../detection/pii/types.js'
import type { SafetyResult } from '../detection/safety/types.js'
import { fillTemplate, loadPromptLibrary, type PromptLibrary } from './library.js'
import type { PromptBuilder } from './types.js'

/**
 * LibraryPromptBuilder - assembles prompts from a prompt library.
 *
 * Both prompts start with the system prompt and the category definitions
 * and end with the document text, so the two models see the same framing.
 */
export class LibraryPromptBuilder implements PromptBuilder {
  constructor(private readonly library: PromptLibrary = loadPromptLibrary()) {}

  buildFinalClassificationPrompt(
    documentText: string,
    pii: PiiResult,
    safety: SafetyResult
  ): string {
    return [
      this.library.systemPrompt,
      `## Category Definitions\n${this.formatCategories()}`,
      `## PII Detection Results\n${this.formatPii(pii)}`,
      `## Content Safety Results\n${this.formatSafety(safety)}`,
      `## Task\n${this.library.finalClassificationTask}`,
      `## Document Content\n${documentText}`,
      `## Instructions\n${this.library.citationInstructions}`,
      `Provide your response in the following JSON format:\n${this.library.responseFormat}`,
    ].join('\n\n')
  }

  buildVerificationPrompt(documentText: string, primary: ClassificationResult): string {
    const task = fillTemplate(this.library.verificationTask, {
      primary_category: primary.category,
      primary_confidence: String(primary.confidence),
      primary_reasoning: primary.reasoning,
    })

    return [
      this.library.systemPrompt,
      `## Category Definitions\n${this.formatCategories()}`,
      `## Verification Task\n${task}`,
      `## Document Content\n${documentText}`,
      this.library.verificationInstructions,
    ].join('\n\n')
  }

  private formatCategories(): string {
    return Object.entries(this.library.categories)
      .map(([name, definition]) =>
        [
          `### ${name}`,
          `Description: ${definition.description}`,
          `Keywords: ${definition.keywords.join(', ')}`,
        ].join('\n')
      )
      .join('\n\n')
  }

  private formatPii(pii: PiiResult): string {
    if (!pii.detected) {
      return '- PII Detected: No'
    }
    return [
      '- PII Detected: Yes',
      `- Types: ${pii.types.join(', ')}`,
      `- Severity: ${pii.severity}`,
    ].join('\n')
  }

  private formatSafety(safety: SafetyResult): string {
    if (safety.isSafe) {
      return '- Content is Safe: Yes'
    }
    return [
      '- Content is Safe: No',
      `- Flags: ${safety.totalFlags}`,
      `- Severity: ${safety.overallSeverity}`,
      `- Categories: ${safety.categoriesFlagged.join(', ')}`,
    ].join('\n')
  }
}
