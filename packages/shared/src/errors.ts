/**
 * Pipeline Error Taxonomy
 *
 * Every hard failure of a pipeline run is a PipelineError with a stable
 * category. Validation rejections are not errors; they yield the sentinel.
 */

import type { PipelineErrorCategory } from './types';

export abstract class PipelineError extends Error {
  abstract readonly category: PipelineErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The document could not be read by either extraction strategy, or yielded no text. */
export class ExtractionError extends PipelineError {
  readonly category = 'no_text_extracted' as const;
}

/** The language-model backend failed to respond. */
export class InferenceError extends PipelineError {
  readonly category = 'inference_error' as const;
}

/** The model response carried no JSON object, or one that failed to parse. */
export class ResponseFormatError extends PipelineError {
  readonly category: 'no_json' | 'bad_json';
  readonly raw: string;

  constructor(kind: 'no_json' | 'bad_json', raw: string) {
    super(kind === 'no_json' ? 'No JSON' : 'Bad JSON');
    this.category = kind;
    this.raw = raw;
  }
}

export class PipelineTimeoutError extends PipelineError {
  readonly category = 'timeout' as const;

  constructor(readonly timeoutMs: number) {
    super(`Pipeline run exceeded ${timeoutMs}ms`);
  }
}

/** A record already exists for this (non-sentinel) identifier. */
export class DuplicateIdentifierError extends PipelineError {
  readonly category = 'duplicate_identifier' as const;

  constructor(readonly identifier: string) {
    super(`PO ${identifier} already exists`);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

const PUBLIC_MESSAGES: Record<PipelineErrorCategory, string> = {
  no_text_extracted: 'No text extracted',
  inference_error: 'Language model backend error',
  no_json: 'No JSON',
  bad_json: 'Bad JSON',
  timeout: 'Pipeline timed out',
  duplicate_identifier: 'PO already exists',
};

/** Message shown to API and CLI callers for a failed run. */
export function publicMessage(error: PipelineError): string {
  return PUBLIC_MESSAGES[error.category];
}
