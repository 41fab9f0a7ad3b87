/**
 * Default Pipeline Wiring
 *
 * pdfjs-dist text layer, pdftoppm + tesseract OCR, an OpenAI-compatible model
 * endpoint and the compiled-in store allow-list.
 */

import { config as defaultConfig, type Config } from '../config';
import { DEFAULT_STORE_ALLOW_LIST, type StoreAllowList } from '../stores';
import { RasterOcr } from '../extraction/ocr';
import { extractDigitalText } from '../extraction/pdf';
import { TextExtractor, type PdfCapabilities } from '../extraction/text-extractor';
import { IdentifierTranslator } from '../translation/translator';
import { createChatCompletion } from '../translation/openai-completion';
import { ResponseValidator } from '../validation/response-validator';
import type { RecordStore } from '../store/record-store';
import { PurchaseOrderPipeline } from './po-pipeline';

export interface DefaultPipelineOptions {
  config?: Config;
  allowList?: StoreAllowList;
  store?: RecordStore;
}

export function createPdfCapabilities(cfg: Config): PdfCapabilities {
  const ocr = new RasterOcr({
    pdftoppmCmd: cfg.pdftoppmCmd,
    tesseractCmd: cfg.tesseractCmd,
    dpi: cfg.ocrDpi,
    language: cfg.ocrLanguage,
  });

  return {
    extractDigitalText: (filePath) => extractDigitalText(filePath),
    rasterizePages: (filePath) => ocr.rasterizePages(filePath),
    imageToText: (image) => ocr.imageToText(image),
  };
}

export function createDefaultPipeline(options: DefaultPipelineOptions = {}): PurchaseOrderPipeline {
  const cfg = options.config ?? defaultConfig;
  const allowList = options.allowList ?? DEFAULT_STORE_ALLOW_LIST;

  const complete = createChatCompletion({
    baseUrl: cfg.llmBaseUrl,
    model: cfg.llmModel,
    apiKey: cfg.llmApiKey,
    timeoutMs: cfg.llmRequestTimeoutMs,
  });

  return new PurchaseOrderPipeline({
    extractor: new TextExtractor(createPdfCapabilities(cfg), {
      minDigitalTextLength: cfg.minDigitalTextLength,
    }),
    translator: new IdentifierTranslator(complete, { allowList }),
    validator: new ResponseValidator(allowList),
    store: options.store,
    timeoutMs: cfg.pipelineTimeoutMs,
  });
}
