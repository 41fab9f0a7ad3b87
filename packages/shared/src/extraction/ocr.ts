/**
 * Raster OCR
 *
 * Rasterizes PDF pages with poppler's `pdftoppm` and reads each page image
 * with the `tesseract` CLI. Both binaries must be on PATH (or configured).
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../logger';

const execFileAsync = promisify(execFile);

export interface PageImage {
  pageNumber: number;
  imagePath: string;
}

/** Page images on disk; `dispose` removes them. */
export interface RasterizedDocument {
  pages: PageImage[];
  dispose(): Promise<void>;
}

export interface RasterOcrOptions {
  pdftoppmCmd: string;
  tesseractCmd: string;
  dpi: number;
  language: string;
}

const PAGE_IMAGE_PATTERN = /-(\d+)\.png$/;

/**
 * Map pdftoppm output names (`page-1.png`, `page-01.png`, ...) to page numbers,
 * in page order. Files without a page suffix are ignored.
 */
export function collectPageImages(dir: string, fileNames: string[]): PageImage[] {
  const pages: PageImage[] = [];
  for (const fileName of fileNames) {
    const match = PAGE_IMAGE_PATTERN.exec(fileName);
    if (!match) continue;
    pages.push({ pageNumber: parseInt(match[1], 10), imagePath: path.join(dir, fileName) });
  }
  return pages.sort((a, b) => a.pageNumber - b.pageNumber);
}

function describeExecFailure(command: string, error: unknown): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return `${command} not found; install it or set its path in the environment`;
  }
  if (error instanceof Error && 'stderr' in error && error.stderr) {
    return `${command} failed: ${String(error.stderr).trim()}`;
  }
  return `${command} failed: ${error instanceof Error ? error.message : String(error)}`;
}

export class RasterOcr {
  constructor(private readonly options: RasterOcrOptions) {}

  async rasterizePages(filePath: string): Promise<RasterizedDocument> {
    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'storepo-ocr-'));
    const dispose = () => fs.promises.rm(workDir, { recursive: true, force: true });

    try {
      await execFileAsync(this.options.pdftoppmCmd, [
        '-png',
        '-r',
        String(this.options.dpi),
        filePath,
        path.join(workDir, 'page'),
      ]);
    } catch (error) {
      await dispose();
      throw new Error(describeExecFailure('pdftoppm', error), { cause: error });
    }

    const pages = collectPageImages(workDir, await fs.promises.readdir(workDir));
    logger.debug('Rasterized PDF pages', { filePath, pageCount: pages.length, dpi: this.options.dpi });

    return { pages, dispose };
  }

  async imageToText(image: PageImage): Promise<string> {
    try {
      const { stdout } = await execFileAsync(
        this.options.tesseractCmd,
        [image.imagePath, 'stdout', '-l', this.options.language],
        { maxBuffer: 1024 * 1024 * 20 }
      );
      return stdout;
    } catch (error) {
      throw new Error(describeExecFailure('tesseract', error), { cause: error });
    }
  }
}
