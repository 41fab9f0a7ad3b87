/**
 * Shared TypeScript Types
 *
 * Types for the purchase-order identifier pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Identifiers
// ============================================================================

/** Fallback identifier for documents whose store or PO could not be determined. */
export const SENTINEL_IDENTIFIER = 'UNKNOWN';

/** Either `STORE-POCODE` (e.g. "436-10432") or the sentinel. */
export type Identifier = string;

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionMode = 'digital' | 'ocr';

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface TextExtractionResult {
  text: string;
  mode: ExtractionMode;
  pageCount: number;
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationOutcome =
  | 'ok'
  | 'no_json'
  | 'bad_json'
  | 'no_identifier'
  | 'unauthorized_store'
  | 'malformed_identifier';

export interface ResponseValidation {
  identifier: Identifier;
  outcome: ValidationOutcome;
  /** Human-readable outcome label, e.g. "rejected: unauthorized store" */
  diagnostic: string;
  /** The offending snippet or value for non-ok outcomes */
  raw?: string;
}

// ============================================================================
// Records
// ============================================================================

export interface PurchaseOrderRecord {
  id: string;
  po_number: Identifier;
  pdf_path: string;
  created_at: string;
}

// ============================================================================
// Pipeline Results
// ============================================================================

export interface ParsedPurchaseOrder {
  identifier: Identifier;
  outcome: ValidationOutcome;
  extractionMode: ExtractionMode;
  canonicalText: string;
}

export interface IngestedPurchaseOrder extends ParsedPurchaseOrder {
  record: PurchaseOrderRecord;
}

// ============================================================================
// API / CLI Contracts
// ============================================================================

/** Categories a failed pipeline run can carry */
export type PipelineErrorCategory =
  | 'no_text_extracted'
  | 'inference_error'
  | 'no_json'
  | 'bad_json'
  | 'timeout'
  | 'duplicate_identifier';

export type ErrorCategory =
  | PipelineErrorCategory
  | 'invalid_request'
  | 'payload_too_large'
  | 'unsupported_media_type'
  | 'not_found'
  | 'internal_error';

export interface ErrorResponse {
  error: string;
  category: ErrorCategory;
  raw?: string;
  correlation_id?: string;
}

export interface UploadResponse {
  identifier: Identifier;
  document_ref: string;
  outcome: ValidationOutcome;
  correlation_id: string;
}

export interface SearchResponse {
  identifier: Identifier;
  pdf_link: string;
  created_at: string;
}

export interface UnresolvedListResponse {
  items: Array<{ id: string; pdf_link: string; created_at: string }>;
}

/** The single JSON line the CLI writes to stdout. */
export type ParseResultLine = { po_number: Identifier } | { error: string; raw?: string };
