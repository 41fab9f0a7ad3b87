/**
 * Text Extractor
 *
 * Digital text layer first, OCR fallback. The decision is made once per
 * document: when the digital layer is too short the OCR result is final,
 * however short it turns out to be.
 */

import { logger } from '../logger';
import { ExtractionError } from '../errors';
import { extractionDurationHistogram } from '../metrics';
import type { ExtractionMode, PageText, TextExtractionResult } from '../types';
import type { PageImage, RasterizedDocument } from './ocr';

export const PAGE_SEPARATOR = '\n';

/**
 * What the extractor needs from PDF and OCR tooling.
 */
export interface PdfCapabilities {
  /** digital_text_extract */
  extractDigitalText(filePath: string): Promise<PageText[]>;
  /** raster_page_images */
  rasterizePages(filePath: string): Promise<RasterizedDocument>;
  /** image_to_text */
  imageToText(image: PageImage): Promise<string>;
}

export interface TextExtractorOptions {
  /** Trimmed digital text must be longer than this to skip OCR */
  minDigitalTextLength: number;
}

interface DigitalLayer {
  pages: PageText[];
  failure?: unknown;
}

export class TextExtractor {
  constructor(
    private readonly capabilities: PdfCapabilities,
    private readonly options: TextExtractorOptions
  ) {}

  async extract(filePath: string): Promise<TextExtractionResult> {
    const startTime = Date.now();

    const digital = await this.readDigitalLayer(filePath);
    const digitalText = digital.pages.map((p) => p.text).join(PAGE_SEPARATOR);
    const digitalLength = digitalText.trim().length;

    let result: TextExtractionResult;
    if (digitalLength > this.options.minDigitalTextLength) {
      result = { text: digitalText, mode: 'digital', pageCount: digital.pages.length };
    } else {
      logger.warn('Digital text layer below threshold, falling back to OCR', {
        filePath,
        digitalChars: digitalLength,
        threshold: this.options.minDigitalTextLength,
      });
      result = await this.readWithOcr(filePath, digital.failure);
    }

    this.record(result.mode, startTime);
    logger.info('Text extraction complete', {
      filePath,
      extractionMode: result.mode,
      pageCount: result.pageCount,
      totalChars: result.text.trim().length,
    });

    return result;
  }

  private async readDigitalLayer(filePath: string): Promise<DigitalLayer> {
    try {
      return { pages: await this.capabilities.extractDigitalText(filePath) };
    } catch (error) {
      // An unreadable text layer is handled like an empty one; OCR decides.
      logger.warn('Digital text layer could not be read', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return { pages: [], failure: error };
    }
  }

  private async readWithOcr(
    filePath: string,
    digitalFailure: unknown
  ): Promise<TextExtractionResult> {
    let raster: RasterizedDocument;
    try {
      raster = await this.capabilities.rasterizePages(filePath);
    } catch (error) {
      throw this.unreadable(filePath, digitalFailure, error);
    }

    try {
      const pageTexts: string[] = [];
      for (const page of raster.pages) {
        pageTexts.push(await this.capabilities.imageToText(page));
      }
      return { text: pageTexts.join(PAGE_SEPARATOR), mode: 'ocr', pageCount: raster.pages.length };
    } catch (error) {
      throw this.unreadable(filePath, digitalFailure, error);
    } finally {
      await raster.dispose();
    }
  }

  private unreadable(filePath: string, digitalFailure: unknown, ocrFailure: unknown): ExtractionError {
    const cause =
      digitalFailure === undefined
        ? ocrFailure
        : new AggregateError([digitalFailure, ocrFailure], 'Both extraction strategies failed');
    logger.error('Document unreadable', ocrFailure, { filePath });
    return new ExtractionError(`Could not read document: ${filePath}`, { cause });
  }

  private record(mode: ExtractionMode, startTime: number): void {
    extractionDurationHistogram.observe({ extraction_mode: mode }, (Date.now() - startTime) / 1000);
  }
}
