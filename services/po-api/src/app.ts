/**
 * PO API application
 *
 * POST /upload            - store a PDF and run it through the pipeline
 * GET  /search/:po        - look up the document for an identifier
 * GET  /records/:id       - look up a record by surrogate id
 * GET  /unresolved        - documents stored under the sentinel identifier
 * GET  /PDF_storage/:file - stored documents
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import { validate as isUuid } from 'uuid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isPipelineError,
  publicMessage,
  validateUploadResponse,
  ResponseFormatError,
  type PurchaseOrderPipeline,
  type RecordStore,
  type ErrorCategory,
  type ErrorResponse,
  type SearchResponse,
  type UnresolvedListResponse,
  type UploadResponse,
} from '@storepo/shared';
import {
  DEFAULT_UPLOAD_NAME,
  discardUpload,
  documentLink,
  looksLikePdf,
  saveUpload,
  type StoredUpload,
} from './lib/upload';

export interface AppDeps {
  pipeline: PurchaseOrderPipeline;
  store: RecordStore;
  uploadDir: string;
  maxUploadBytes: number;
  /** Resolves when the database is reachable */
  checkDatabase: () => Promise<void>;
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  no_text_extracted: 400,
  no_json: 400,
  bad_json: 400,
  invalid_request: 400,
  not_found: 404,
  payload_too_large: 413,
  duplicate_identifier: 409,
  unsupported_media_type: 415,
  internal_error: 500,
  inference_error: 502,
  timeout: 504,
};

function sendError(
  res: Response,
  category: ErrorCategory,
  message: string,
  raw?: string
): void {
  const body: ErrorResponse = {
    error: message,
    category,
    ...(raw !== undefined ? { raw } : {}),
    correlation_id: String(res.getHeader('X-Correlation-Id')),
  };
  res.status(STATUS_BY_CATEGORY[category]).json(body);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = headerValue(req.headers['x-correlation-id']) || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId, source: 'api' }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.use('/PDF_storage', express.static(deps.uploadDir, { index: false }));

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.checkDatabase();

      res.json({
        status: 'healthy',
        service: 'po-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'po-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /upload
   * Body: raw PDF bytes. Suggested name in X-Filename or ?filename=.
   */
  app.post(
    '/upload',
    express.raw({
      type: ['application/pdf', 'application/octet-stream'],
      limit: deps.maxUploadBytes,
    }),
    async (req: Request, res: Response) => {
      const correlationId = String(res.getHeader('X-Correlation-Id'));
      const body: unknown = req.body;

      if (!Buffer.isBuffer(body) || body.length === 0) {
        sendError(res, 'invalid_request', 'Request body must be the PDF file');
        return;
      }
      if (!looksLikePdf(body)) {
        sendError(res, 'unsupported_media_type', 'Uploaded file is not a PDF');
        return;
      }

      const suggestedName =
        headerValue(req.headers['x-filename']) ?? queryString(req.query.filename) ?? DEFAULT_UPLOAD_NAME;

      let upload: StoredUpload | undefined;
      try {
        upload = await saveUpload(deps.uploadDir, suggestedName, body);
        const result = await deps.pipeline.ingest(upload.filePath);

        const response: UploadResponse = {
          identifier: result.identifier,
          document_ref: documentLink(upload.filePath),
          outcome: result.outcome,
          correlation_id: correlationId,
        };

        const validation = validateUploadResponse(response);
        if (!validation.valid) {
          logger.warn('UploadResponse validation failed', { errors: validation.errors });
        }

        res.json(response);
      } catch (error) {
        if (upload) {
          await discardUpload(upload.filePath);
        }

        if (isPipelineError(error)) {
          const raw = error instanceof ResponseFormatError ? error.raw : undefined;
          sendError(res, error.category, publicMessage(error), raw);
          return;
        }

        logger.error('Upload failed', error);
        sendError(res, 'internal_error', 'Failed to process upload');
      }
    }
  );

  /**
   * GET /search/:po
   */
  app.get('/search/:po', async (req: Request, res: Response) => {
    const po = req.params.po.trim();

    try {
      const record = await deps.store.lookup(po);
      if (!record) {
        sendError(res, 'not_found', 'PO not found');
        return;
      }

      const response: SearchResponse = {
        identifier: record.po_number,
        pdf_link: documentLink(record.pdf_path),
        created_at: record.created_at,
      };
      res.json(response);
    } catch (error) {
      logger.error('Failed to search PO', error, { po });
      sendError(res, 'internal_error', 'Failed to search PO');
    }
  });

  /**
   * GET /records/:id
   */
  app.get('/records/:id', async (req: Request, res: Response) => {
    const { id } = req.params;

    if (!isUuid(id)) {
      sendError(res, 'not_found', `Record ${id} not found`);
      return;
    }

    try {
      const record = await deps.store.getById(id);
      if (!record) {
        sendError(res, 'not_found', `Record ${id} not found`);
        return;
      }
      res.json({ ...record, pdf_link: documentLink(record.pdf_path) });
    } catch (error) {
      logger.error('Failed to get record', error, { id });
      sendError(res, 'internal_error', 'Failed to retrieve record');
    }
  });

  /**
   * GET /unresolved?limit=
   */
  app.get('/unresolved', async (req: Request, res: Response) => {
    const rawLimit = queryString(req.query.limit);
    const limit = rawLimit === undefined ? 20 : Number(rawLimit);

    if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
      sendError(res, 'invalid_request', 'limit must be an integer between 1 and 100');
      return;
    }

    try {
      const records = await deps.store.listUnresolved(limit);
      const response: UnresolvedListResponse = {
        items: records.map((r) => ({
          id: r.id,
          pdf_link: documentLink(r.pdf_path),
          created_at: r.created_at,
        })),
      };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list unresolved records', error);
      sendError(res, 'internal_error', 'Failed to list unresolved records');
    }
  });

  // Body parser failures (oversized uploads and the like)
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof Error && 'status' in err && err.status === 413) {
      sendError(res, 'payload_too_large', 'Upload exceeds the size limit');
      return;
    }
    logger.error('Unhandled request error', err);
    sendError(res, 'internal_error', 'Internal server error');
  });

  return app;
}
