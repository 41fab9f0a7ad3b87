/**
 * Text Canonicalization
 *
 * Folds extracted PDF/OCR text into the character set the store-PO prompt
 * examples are written in. `#`, `:`, `-` and `.` survive because vendor PO
 * phrasing ("po#:", "b00911-az") depends on them.
 */

const LINE_BREAKS = /[\r\n]+/g;
const OUTSIDE_ALLOWED_SET = /[^a-z0-9#:\-. ]/g;
const SPACE_RUNS = / +/g;

export function canonicalize(rawText: string): string {
  return rawText
    .toLowerCase()
    .replace(LINE_BREAKS, ' ')
    .replace(OUTSIDE_ALLOWED_SET, '')
    .replace(SPACE_RUNS, ' ')
    .trim();
}
