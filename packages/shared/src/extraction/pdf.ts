/**
 * PDF Digital Text Layer
 *
 * Reads the embedded text layer of a PDF using pdfjs-dist, one entry per page.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import type { PageText } from '../types';

// ESM-only build, loaded through a native import()
const importPdfJs = () => import('pdfjs-dist/legacy/build/pdf.mjs');

type PdfJs = Awaited<ReturnType<typeof importPdfJs>>;

let pdfjs: Promise<PdfJs> | undefined;

/** Load pdfjs on first use and point it at its worker for Node.js. */
function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjs) {
    pdfjs = importPdfJs().then((lib) => {
      lib.GlobalWorkerOptions.workerSrc = path.join(
        path.dirname(require.resolve('pdfjs-dist/package.json')),
        'legacy/build/pdf.worker.mjs'
      );
      return lib;
    });
  }
  return pdfjs;
}

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Extract the text layer of every page, preserving line structure.
 *
 * Groups text items by Y position so that labels and values printed on one
 * visual line ("Ship to Store: 436") stay together.
 */
export async function extractDigitalText(filePath: string): Promise<PageText[]> {
  logger.debug('Reading PDF text layer', { filePath });

  const pdfjsLib = await loadPdfJs();
  const data = new Uint8Array(fs.readFileSync(filePath));
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, PositionedText[]>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Text on the same visual line may have slight Y variations
        const y = Math.round(Number(item.transform[5]));
        const x = Math.round(Number(item.transform[4]));

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Top to bottom on the page
      const sortedYPositions = [...itemsByY.keys()].sort((a, b) => b - a);

      const lines: string[] = [];
      for (const y of sortedYPositions) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map((item) => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
      page.cleanup();
    }

    return pages;
  } finally {
    await pdf.destroy();
  }
}
