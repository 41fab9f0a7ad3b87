/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for model payloads and the outbound result contracts.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { AnySchema, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

/**
 * Shape the model is asked to return. `translated_po` is optional: a missing
 * field means the model gave no identifier.
 */
export const MODEL_RESPONSE_SCHEMA = {
  $id: 'model_response',
  type: 'object',
  properties: {
    translated_po: { type: 'string' },
  },
} as const;

const compiled = new Map<string, ValidateFunction>();

function loadSchema(schemaName: string): AnySchema {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getValidator(key: string, load: () => AnySchema): ValidateFunction {
  let validate = compiled.get(key);
  if (!validate) {
    validate = ajv.compile(load());
    compiled.set(key, validate);
  }
  return validate;
}

export interface SchemaValidationResult {
  valid: boolean;
  errors?: string[];
}

function run(validate: ValidateFunction, data: unknown, label: string): SchemaValidationResult {
  if (!validate(data)) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/** Decoded JSON object found in a model response */
export interface ModelPayload {
  translated_po?: string;
}

let modelPayloadValidator: ValidateFunction<ModelPayload> | undefined;

/**
 * Check the decoded JSON object found in a model response
 */
export function isModelPayload(data: unknown): data is ModelPayload {
  if (!modelPayloadValidator) {
    modelPayloadValidator = ajv.compile<ModelPayload>(MODEL_RESPONSE_SCHEMA);
  }
  return modelPayloadValidator(data);
}

/**
 * Validate a CLI result line against parse_result.schema.json
 */
export function validateParseResult(data: unknown): SchemaValidationResult {
  return run(
    getValidator('parse_result', () => loadSchema('parse_result.schema.json')),
    data,
    'ParseResult'
  );
}

/**
 * Validate an upload response against upload_response.schema.json
 */
export function validateUploadResponse(data: unknown): SchemaValidationResult {
  return run(
    getValidator('upload_response', () => loadSchema('upload_response.schema.json')),
    data,
    'UploadResponse'
  );
}

/**
 * Validate a stored record against purchase_order_record.schema.json
 */
export function validateRecord(data: unknown): SchemaValidationResult {
  return run(
    getValidator('purchase_order_record', () => loadSchema('purchase_order_record.schema.json')),
    data,
    'PurchaseOrderRecord'
  );
}
