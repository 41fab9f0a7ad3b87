/**
 * Purchase-Order Pipeline
 *
 * path -> text -> canonical text -> model response -> identifier [-> record]
 *
 * Extraction, translation and unusable model output fail the run and nothing
 * is written. Validation rejections do not fail it: they yield the sentinel,
 * which is stored like any other identifier.
 */

import path from 'path';
import { logger } from '../logger';
import { getContext, getCorrelationId, runWithContextAsync } from '../context';
import { pipelineRunsCounter } from '../metrics';
import {
  ExtractionError,
  PipelineTimeoutError,
  ResponseFormatError,
  isPipelineError,
} from '../errors';
import { canonicalize } from '../text/canonicalize';
import type { TextExtractor } from '../extraction/text-extractor';
import type { IdentifierTranslator } from '../translation/translator';
import type { ResponseValidator } from '../validation/response-validator';
import type { RecordStore } from '../store/record-store';
import type { ExtractionMode, IngestedPurchaseOrder, ParsedPurchaseOrder } from '../types';

export interface PurchaseOrderPipelineDeps {
  extractor: TextExtractor;
  translator: IdentifierTranslator;
  validator: ResponseValidator;
  /** Required for ingest() only */
  store?: RecordStore;
  /** Whole-run timeout; omit or 0 for none */
  timeoutMs?: number;
}

interface RunState {
  extractionMode?: ExtractionMode;
}

export class PurchaseOrderPipeline {
  constructor(private readonly deps: PurchaseOrderPipelineDeps) {}

  /**
   * Determine the identifier for a document without persisting anything.
   */
  async parse(filePath: string): Promise<ParsedPurchaseOrder> {
    return this.run(filePath, (state) => this.withTimeout(this.parseStages(filePath, state)));
  }

  /**
   * Determine the identifier and record it against the document path.
   */
  async ingest(filePath: string): Promise<IngestedPurchaseOrder> {
    const { store } = this.deps;
    if (!store) {
      throw new Error('PurchaseOrderPipeline.ingest requires a record store');
    }

    return this.run(filePath, async (state) => {
      const parsed = await this.withTimeout(this.parseStages(filePath, state));
      // Not raced: a started insert is reported as it completes
      const record = await store.insert(parsed.identifier, filePath);
      return { ...parsed, record };
    });
  }

  private async parseStages(filePath: string, state: RunState): Promise<ParsedPurchaseOrder> {
    const extraction = await this.deps.extractor.extract(filePath);
    state.extractionMode = extraction.mode;

    const canonicalText = canonicalize(extraction.text);
    if (!canonicalText) {
      logger.warn('No text found in document', { filePath, extractionMode: extraction.mode });
      throw new ExtractionError('No text extracted');
    }

    const response = await this.deps.translator.translate(canonicalText);
    const validation = this.deps.validator.validate(response);

    if (validation.outcome === 'no_json' || validation.outcome === 'bad_json') {
      throw new ResponseFormatError(validation.outcome, response);
    }

    logger.info('Identifier determined', {
      po_number: validation.identifier,
      outcome: validation.outcome,
      diagnostic: validation.diagnostic,
    });

    return {
      identifier: validation.identifier,
      outcome: validation.outcome,
      extractionMode: extraction.mode,
      canonicalText,
    };
  }

  private async run<T>(filePath: string, stages: (state: RunState) => Promise<T>): Promise<T> {
    const context = {
      ...getContext(),
      correlationId: getCorrelationId(),
      documentRef: path.basename(filePath),
    };

    return runWithContextAsync(context, async () => {
      const state: RunState = {};
      const startTime = Date.now();

      try {
        const result = await stages(state);
        pipelineRunsCounter.inc({ status: 'success', extraction_mode: state.extractionMode ?? 'none' });
        logger.info('Pipeline run complete', { duration_ms: Date.now() - startTime });
        return result;
      } catch (error) {
        pipelineRunsCounter.inc({
          status: isPipelineError(error) ? error.category : 'internal_error',
          extraction_mode: state.extractionMode ?? 'none',
        });
        logger.error('Pipeline run failed', error, { duration_ms: Date.now() - startTime });
        throw error;
      }
    });
  }

  /** Bounds the extract/translate/validate stages; persistence is not raced. */
  private async withTimeout<T>(work: Promise<T>): Promise<T> {
    const timeoutMs = this.deps.timeoutMs;
    if (!timeoutMs) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new PipelineTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
