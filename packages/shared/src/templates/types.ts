/**
 * Prompt Template Types
 */

/**
 * Fixed prompt for a single-turn text completion.
 */
export interface PromptTemplate {
  /** Bumped whenever the wording or examples change; logged with every request */
  version: string;

  /**
   * Prompt with placeholders:
   * - {{store_codes}}: comma-separated approved store codes
   * - {{raw_text}}: the canonicalized document text
   */
  promptTemplate: string;

  /** Human-readable description of what this template produces */
  description: string;
}
