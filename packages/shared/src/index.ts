/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
  type RequestSource,
} from './context';

// Logger
export { logger, configureLogger, type LogContext, type LoggerOptions } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  ExtractionError,
  InferenceError,
  ResponseFormatError,
  PipelineTimeoutError,
  DuplicateIdentifierError,
  isPipelineError,
  publicMessage,
} from './errors';

// Store allow-list
export {
  APPROVED_STORE_CODES,
  StoreAllowList,
  DEFAULT_STORE_ALLOW_LIST,
  isWellFormedIdentifier,
} from './stores';

// Metrics
export {
  register,
  pipelineRunsCounter,
  extractionDurationHistogram,
  validationOutcomesCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  isModelPayload,
  validateParseResult,
  validateUploadResponse,
  validateRecord,
  MODEL_RESPONSE_SCHEMA,
  type ModelPayload,
  type SchemaValidationResult,
} from './schemas';

// Extraction
export {
  TextExtractor,
  PAGE_SEPARATOR,
  type PdfCapabilities,
  type TextExtractorOptions,
} from './extraction/text-extractor';
export { extractDigitalText } from './extraction/pdf';
export {
  RasterOcr,
  collectPageImages,
  type PageImage,
  type RasterizedDocument,
  type RasterOcrOptions,
} from './extraction/ocr';

// Canonicalization
export { canonicalize } from './text/canonicalize';

// Prompt templates
export { STORE_PO_TEMPLATE } from './templates/store-po.template';
export type { PromptTemplate } from './templates/types';

// Translation
export {
  IdentifierTranslator,
  renderPrompt,
  type CompletionFn,
  type IdentifierTranslatorOptions,
} from './translation/translator';
export { createChatCompletion, type ChatCompletionOptions } from './translation/openai-completion';

// Validation
export { ResponseValidator, OUTCOME_LABELS } from './validation/response-validator';

// Record store
export type { RecordStore } from './store/record-store';
export {
  PgRecordStore,
  createPool,
  poolExecutor,
  type SqlExecutor,
  type PurchaseOrderRow,
} from './store/pg-record-store';

// Pipeline
export { PurchaseOrderPipeline, type PurchaseOrderPipelineDeps } from './pipeline/po-pipeline';
export {
  createDefaultPipeline,
  createPdfCapabilities,
  type DefaultPipelineOptions,
} from './pipeline/default-pipeline';
