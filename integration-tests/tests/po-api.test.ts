/**
 * PO API tests: the express app on an ephemeral port, with the pipeline
 * wired to in-process stand-ins.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { createApp } from '../../services/po-api/src/app';
import { InMemoryRecordStore, buildPipeline, silenceLogs, type TestPipelineOptions } from './helpers';

const PDF_BODY = Buffer.from('%PDF-1.4\n% test document\n');

interface RunningApi {
  baseUrl: string;
  store: InMemoryRecordStore;
  uploadDir: string;
}

interface StartOptions {
  pipeline?: Omit<TestPipelineOptions, 'store'>;
  maxUploadBytes?: number;
  databaseDown?: boolean;
}

const servers: Server[] = [];
const tempDirs: string[] = [];

async function startApi(options: StartOptions = {}): Promise<RunningApi> {
  const store = new InMemoryRecordStore();
  const uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), 'po-api-test-'));
  tempDirs.push(uploadDir);

  const { pipeline } = buildPipeline({
    ...(options.pipeline ?? {
      pdf: { ocrPages: ['Ship to Store: 436 — PO: 10432'] },
      response: '{"translated_po": "436-10432"}',
    }),
    store,
  });

  const app = createApp({
    pipeline,
    store,
    uploadDir,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
    checkDatabase: async () => {
      if (options.databaseDown) throw new Error('connection refused');
    },
  });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  servers.push(server);

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { baseUrl: `http://127.0.0.1:${address.port}`, store, uploadDir };
}

async function readJson(res: { json(): Promise<unknown> }): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new Error('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

function upload(baseUrl: string, body: Buffer, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}/upload`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/pdf', ...headers },
    body,
  });
}

describe('PO API', () => {
  silenceLogs();

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  describe('POST /upload', () => {
    it('should store the PDF and return its identifier', async () => {
      const api = await startApi();

      const res = await upload(api.baseUrl, PDF_BODY, {
        'X-Filename': 'My PO.pdf',
        'X-Correlation-Id': 'test-correlation-id',
      });
      const body = await readJson(res);

      expect(res.status).toBe(200);
      expect(res.headers.get('x-correlation-id')).toBe('test-correlation-id');
      expect(body).toMatchObject({
        identifier: '436-10432',
        outcome: 'ok',
        correlation_id: 'test-correlation-id',
      });
      expect(body.document_ref).toMatch(/^\/PDF_storage\/[0-9A-HJKMNP-TV-Z]{26}-My_PO\.pdf$/);

      expect(api.store.records).toHaveLength(1);
      expect(path.dirname(api.store.records[0].pdf_path)).toBe(api.uploadDir);
      expect(fs.readFileSync(api.store.records[0].pdf_path)).toEqual(PDF_BODY);
    });

    it('should serve the stored document at its link', async () => {
      const api = await startApi();

      const body = await readJson(await upload(api.baseUrl, PDF_BODY));
      const res = await fetch(`${api.baseUrl}${String(body.document_ref)}`);

      expect(res.status).toBe(200);
      expect(await res.text()).toBe(PDF_BODY.toString());
      expect(String(body.document_ref)).toMatch(/-upload\.pdf$/);
    });

    it('should return 409 for an identifier that is already stored', async () => {
      const api = await startApi();

      await upload(api.baseUrl, PDF_BODY);
      const res = await upload(api.baseUrl, PDF_BODY, { 'X-Correlation-Id': 'second-upload' });

      expect(res.status).toBe(409);
      expect(await readJson(res)).toEqual({
        error: 'PO already exists',
        category: 'duplicate_identifier',
        correlation_id: 'second-upload',
      });
      expect(api.store.records).toHaveLength(1);
      expect(fs.readdirSync(api.uploadDir)).toEqual([path.basename(api.store.records[0].pdf_path)]);
    });

    it('should accept unresolved documents with the sentinel', async () => {
      const api = await startApi({
        pipeline: { pdf: { ocrPages: ['no store here'] }, response: '{"translated_po": "UNKNOWN"}' },
      });

      const first = await readJson(await upload(api.baseUrl, PDF_BODY));
      const second = await upload(api.baseUrl, PDF_BODY);

      expect(first).toMatchObject({ identifier: 'UNKNOWN', outcome: 'no_identifier' });
      expect(second.status).toBe(200);
      expect(api.store.records).toHaveLength(2);
    });

    it('should return 400 with the raw response for unusable model output', async () => {
      const api = await startApi({
        pipeline: { pdf: { ocrPages: ['Store 436 PO 10432'] }, response: 'Cannot help with that.' },
      });

      const res = await upload(api.baseUrl, PDF_BODY);

      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({
        error: 'No JSON',
        category: 'no_json',
        raw: 'Cannot help with that.',
      });
      expect(api.store.records).toHaveLength(0);
      expect(fs.readdirSync(api.uploadDir)).toEqual([]);
    });

    it('should return 400 when no text is extracted', async () => {
      const api = await startApi({ pipeline: { pdf: { ocrPages: [''] }, response: '{}' } });

      const res = await upload(api.baseUrl, PDF_BODY);

      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({ error: 'No text extracted', category: 'no_text_extracted' });
      expect(fs.readdirSync(api.uploadDir)).toEqual([]);
    });

    it('should return 502 when the model backend fails', async () => {
      const api = await startApi({
        pipeline: { pdf: { ocrPages: ['Store 436 PO 10432'] }, response: new Error('backend down') },
      });

      const res = await upload(api.baseUrl, PDF_BODY);

      expect(res.status).toBe(502);
      expect(await readJson(res)).toMatchObject({ category: 'inference_error' });
    });

    it('should reject an empty body', async () => {
      const api = await startApi();

      const res = await upload(api.baseUrl, Buffer.alloc(0));

      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({ category: 'invalid_request' });
    });

    it('should reject a body that is not a PDF', async () => {
      const api = await startApi();

      const res = await upload(api.baseUrl, Buffer.from('just some text'));

      expect(res.status).toBe(415);
      expect(await readJson(res)).toMatchObject({ category: 'unsupported_media_type' });
      expect(fs.readdirSync(api.uploadDir)).toHaveLength(0);
    });

    it('should reject an upload over the size limit', async () => {
      const api = await startApi({ maxUploadBytes: 64 });

      const res = await upload(api.baseUrl, Buffer.concat([PDF_BODY, Buffer.alloc(200, 0x20)]));

      expect(res.status).toBe(413);
      expect(await readJson(res)).toMatchObject({ category: 'payload_too_large' });
    });
  });

  describe('GET /search/:po', () => {
    it('should return the link for a stored identifier', async () => {
      const api = await startApi();
      const uploaded = await readJson(await upload(api.baseUrl, PDF_BODY));

      const res = await fetch(`${api.baseUrl}/search/436-10432`);

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({
        identifier: '436-10432',
        pdf_link: uploaded.document_ref,
        created_at: api.store.records[0].created_at,
      });
    });

    it('should return 404 for an unknown identifier', async () => {
      const api = await startApi();

      const res = await fetch(`${api.baseUrl}/search/829-00001`);

      expect(res.status).toBe(404);
      expect(await readJson(res)).toMatchObject({ error: 'PO not found', category: 'not_found' });
    });
  });

  describe('GET /records/:id', () => {
    it('should return a record with its link', async () => {
      const api = await startApi();
      await upload(api.baseUrl, PDF_BODY);
      const [record] = api.store.records;

      const res = await fetch(`${api.baseUrl}/records/${record.id}`);

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({ id: record.id, po_number: '436-10432' });
    });

    it('should return 404 for ids that are not UUIDs', async () => {
      const api = await startApi();

      const res = await fetch(`${api.baseUrl}/records/not-a-uuid`);

      expect(res.status).toBe(404);
    });
  });

  describe('GET /unresolved', () => {
    it('should list sentinel records newest first', async () => {
      const api = await startApi({
        pipeline: { pdf: { ocrPages: ['no store'] }, response: '{"translated_po": "UNKNOWN"}' },
      });
      await upload(api.baseUrl, PDF_BODY, { 'X-Filename': 'a.pdf' });
      await upload(api.baseUrl, PDF_BODY, { 'X-Filename': 'b.pdf' });

      const body = await readJson(await fetch(`${api.baseUrl}/unresolved?limit=1`));

      expect(Array.isArray(body.items) ? body.items.length : -1).toBe(1);
      expect(JSON.stringify(body.items)).toMatch(/-b\.pdf"/);
    });

    it('should reject a limit outside 1..100', async () => {
      const api = await startApi();

      const res = await fetch(`${api.baseUrl}/unresolved?limit=0`);

      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({ category: 'invalid_request' });
    });
  });

  describe('GET /health', () => {
    it('should report a reachable database', async () => {
      const api = await startApi();

      const res = await fetch(`${api.baseUrl}/health`);

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({ status: 'healthy', database: 'connected' });
    });

    it('should return 503 when the database is down', async () => {
      const api = await startApi({ databaseDown: true });

      const res = await fetch(`${api.baseUrl}/health`);

      expect(res.status).toBe(503);
      expect(await readJson(res)).toMatchObject({ status: 'unhealthy', error: 'connection refused' });
    });
  });

  describe('GET /metrics', () => {
    it('should expose pipeline counters', async () => {
      const api = await startApi();
      await upload(api.baseUrl, PDF_BODY);

      const res = await fetch(`${api.baseUrl}/metrics`);

      expect(res.status).toBe(200);
      expect(await res.text()).toMatch(/^storepo_pipeline_runs_total\{[^}]*status="success"[^}]*\} \d+$/m);
    });
  });
});
