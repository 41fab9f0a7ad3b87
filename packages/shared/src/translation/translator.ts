/**
 * Identifier Translator
 *
 * Renders the store-PO prompt and hands it to a text-completion backend.
 * The backend is untrusted: its output is returned verbatim and checked
 * only by the ResponseValidator.
 */

import { logger } from '../logger';
import { InferenceError } from '../errors';
import type { StoreAllowList } from '../stores';
import { STORE_PO_TEMPLATE } from '../templates/store-po.template';
import type { PromptTemplate } from '../templates/types';

/** Any text -> text completion backend. */
export type CompletionFn = (prompt: string) => Promise<string>;

export interface IdentifierTranslatorOptions {
  allowList: StoreAllowList;
  template?: PromptTemplate;
}

export function renderPrompt(
  template: PromptTemplate,
  allowList: StoreAllowList,
  canonicalText: string
): string {
  // Replacer functions keep `$` sequences in the inputs literal
  return template.promptTemplate
    .replace('{{store_codes}}', () => allowList.list().join(', '))
    .replace('{{raw_text}}', () => canonicalText);
}

export class IdentifierTranslator {
  private readonly template: PromptTemplate;

  constructor(
    private readonly complete: CompletionFn,
    private readonly options: IdentifierTranslatorOptions
  ) {
    this.template = options.template ?? STORE_PO_TEMPLATE;
  }

  async translate(canonicalText: string): Promise<string> {
    const prompt = renderPrompt(this.template, this.options.allowList, canonicalText);

    logger.info('Translating document text', {
      prompt_version: this.template.version,
      text_length: canonicalText.length,
    });
    logger.debug('Text preview', { preview: canonicalText.slice(0, 300) });

    let response: string;
    try {
      response = await this.complete(prompt);
    } catch (error) {
      throw new InferenceError('Language model request failed', { cause: error });
    }

    logger.debug('Raw model response', { response });
    return response;
  }
}
