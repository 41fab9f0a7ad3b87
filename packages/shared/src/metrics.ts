/**
 * Prometheus Metrics
 *
 * Metrics for monitoring pipeline runs, LLM calls, validation outcomes and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const pipelineRunsCounter = new promClient.Counter({
  name: 'storepo_pipeline_runs_total',
  help: 'Total number of purchase-order pipeline runs',
  labelNames: ['status', 'extraction_mode'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'storepo_extraction_duration_seconds',
  help: 'Duration of document text extraction',
  labelNames: ['extraction_mode'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const validationOutcomesCounter = new promClient.Counter({
  name: 'storepo_validation_outcomes_total',
  help: 'Model response validation outcomes',
  labelNames: ['outcome'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'storepo_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'storepo_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'storepo_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'storepo_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'storepo_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
