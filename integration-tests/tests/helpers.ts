/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF tooling, the model backend and the
 * database, plus a pipeline wired from them.
 */

import {
  DuplicateIdentifierError,
  IdentifierTranslator,
  PurchaseOrderPipeline,
  ResponseValidator,
  StoreAllowList,
  TextExtractor,
  DEFAULT_STORE_ALLOW_LIST,
  SENTINEL_IDENTIFIER,
  type CompletionFn,
  type Identifier,
  type PageImage,
  type PageText,
  type PdfCapabilities,
  type PurchaseOrderRecord,
  type RecordStore,
} from '@storepo/shared';

export interface FakePdf {
  /** Digital text per page; omit for a scanned document */
  digitalPages?: string[];
  /** OCR text per page image */
  ocrPages?: string[];
  digitalFailure?: Error;
  ocrFailure?: Error;
}

export interface FakePdfCalls {
  digital: string[];
  rasterized: string[];
  ocr: number[];
  disposed: number;
}

/**
 * PdfCapabilities answering from canned page text, recording every call.
 */
export function fakePdfCapabilities(pdf: FakePdf): { capabilities: PdfCapabilities; calls: FakePdfCalls } {
  const calls: FakePdfCalls = { digital: [], rasterized: [], ocr: [], disposed: 0 };
  const ocrPages = pdf.ocrPages ?? [];

  const capabilities: PdfCapabilities = {
    async extractDigitalText(filePath: string): Promise<PageText[]> {
      calls.digital.push(filePath);
      if (pdf.digitalFailure) throw pdf.digitalFailure;
      return (pdf.digitalPages ?? []).map((text, i) => ({ pageNumber: i + 1, text }));
    },
    async rasterizePages(filePath: string) {
      calls.rasterized.push(filePath);
      const pages: PageImage[] = ocrPages.map((_, i) => ({
        pageNumber: i + 1,
        imagePath: `/tmp/page-${i + 1}.png`,
      }));
      return {
        pages,
        dispose: async () => {
          calls.disposed += 1;
        },
      };
    },
    async imageToText(image: PageImage): Promise<string> {
      calls.ocr.push(image.pageNumber);
      if (pdf.ocrFailure) throw pdf.ocrFailure;
      return ocrPages[image.pageNumber - 1] ?? '';
    },
  };

  return { capabilities, calls };
}

/**
 * Completion backend returning a fixed response and remembering its prompts.
 */
export function fakeCompletion(response: string | Error): { complete: CompletionFn; prompts: string[] } {
  const prompts: string[] = [];
  const complete: CompletionFn = async (prompt) => {
    prompts.push(prompt);
    if (response instanceof Error) throw response;
    return response;
  };
  return { complete, prompts };
}

/**
 * RecordStore over an array, with the same uniqueness rule as the
 * purchase_orders table.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly records: PurchaseOrderRecord[] = [];
  private nextId = 1;

  async insert(identifier: Identifier, documentPath: string): Promise<PurchaseOrderRecord> {
    if (identifier !== SENTINEL_IDENTIFIER && this.records.some((r) => r.po_number === identifier)) {
      throw new DuplicateIdentifierError(identifier);
    }
    const record: PurchaseOrderRecord = {
      id: `00000000-0000-4000-8000-${String(this.nextId++).padStart(12, '0')}`,
      po_number: identifier,
      pdf_path: documentPath,
      created_at: new Date(Date.UTC(2024, 0, 1, 0, 0, this.records.length)).toISOString(),
    };
    this.records.push(record);
    return record;
  }

  async lookup(identifier: Identifier): Promise<PurchaseOrderRecord | null> {
    const matches = this.records.filter((r) => r.po_number === identifier);
    return matches[matches.length - 1] ?? null;
  }

  async getById(id: string): Promise<PurchaseOrderRecord | null> {
    return this.records.find((r) => r.id === id) ?? null;
  }

  async listUnresolved(limit: number): Promise<PurchaseOrderRecord[]> {
    return this.records
      .filter((r) => r.po_number === SENTINEL_IDENTIFIER)
      .reverse()
      .slice(0, limit);
  }
}

export interface TestPipelineOptions {
  pdf: FakePdf;
  response: string | Error;
  store?: RecordStore;
  allowList?: StoreAllowList;
  minDigitalTextLength?: number;
  timeoutMs?: number;
}

export function buildPipeline(options: TestPipelineOptions) {
  const allowList = options.allowList ?? DEFAULT_STORE_ALLOW_LIST;
  const pdf = fakePdfCapabilities(options.pdf);
  const model = fakeCompletion(options.response);

  const pipeline = new PurchaseOrderPipeline({
    extractor: new TextExtractor(pdf.capabilities, {
      minDigitalTextLength: options.minDigitalTextLength ?? 100,
    }),
    translator: new IdentifierTranslator(model.complete, { allowList }),
    validator: new ResponseValidator(allowList),
    store: options.store,
    timeoutMs: options.timeoutMs,
  });

  return { pipeline, calls: pdf.calls, prompts: model.prompts };
}

/** Digital text long enough to skip OCR at the default threshold */
export function padded(text: string): string {
  return `${text}\n${'Terms: net 30. Deliver to receiving dock. '.repeat(3)}`;
}

/**
 * Silence the JSON logger for the duration of a test file.
 */
export function silenceLogs(): void {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
