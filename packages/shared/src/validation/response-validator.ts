/**
 * Response Validator
 *
 * The only gate between the model's free text and the record store. It never
 * throws: anything it cannot accept becomes the sentinel identifier with an
 * outcome saying why. The allow-list is re-checked here whatever the model
 * claims.
 */

import { logger } from '../logger';
import { validationOutcomesCounter } from '../metrics';
import { isModelPayload } from '../schemas';
import { isSentinel, isWellFormedIdentifier, type StoreAllowList } from '../stores';
import {
  SENTINEL_IDENTIFIER,
  type ResponseValidation,
  type ValidationOutcome,
} from '../types';

// First brace-delimited object, shortest match, may span lines
const JSON_OBJECT_PATTERN = /\{[\s\S]*?\}/;

export const OUTCOME_LABELS: Record<ValidationOutcome, string> = {
  ok: 'ok',
  no_json: 'no JSON',
  bad_json: 'bad JSON',
  no_identifier: 'no identifier',
  unauthorized_store: 'rejected: unauthorized store',
  malformed_identifier: 'rejected: malformed identifier',
};

export class ResponseValidator {
  constructor(private readonly allowList: StoreAllowList) {}

  validate(response: string): ResponseValidation {
    const match = JSON_OBJECT_PATTERN.exec(response);
    if (!match) {
      return this.fallback('no_json', response);
    }

    const snippet = match[0];
    let payload: unknown;
    try {
      payload = JSON.parse(snippet);
    } catch (error) {
      logger.debug('Model JSON did not parse', {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback('bad_json', snippet);
    }

    if (!isModelPayload(payload)) {
      return this.fallback('malformed_identifier', snippet);
    }

    const value = (payload.translated_po ?? SENTINEL_IDENTIFIER).trim();
    if (isSentinel(value)) {
      return this.fallback('no_identifier', snippet);
    }

    const dash = value.indexOf('-');
    if (dash < 0) {
      return this.fallback('malformed_identifier', value);
    }

    const storeCode = value.slice(0, dash);
    if (!this.allowList.has(storeCode)) {
      return this.fallback('unauthorized_store', value);
    }

    if (!isWellFormedIdentifier(value)) {
      return this.fallback('malformed_identifier', value);
    }

    validationOutcomesCounter.inc({ outcome: 'ok' });
    return { identifier: value, outcome: 'ok', diagnostic: OUTCOME_LABELS.ok };
  }

  private fallback(outcome: Exclude<ValidationOutcome, 'ok'>, raw: string): ResponseValidation {
    validationOutcomesCounter.inc({ outcome });
    logger.warn('Model response rejected, using sentinel identifier', {
      outcome,
      diagnostic: OUTCOME_LABELS[outcome],
      raw,
    });
    return {
      identifier: SENTINEL_IDENTIFIER,
      outcome,
      diagnostic: OUTCOME_LABELS[outcome],
      raw,
    };
  }
}
