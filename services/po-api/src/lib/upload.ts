/**
 * Upload Storage
 *
 * Writes uploaded PDFs under the upload directory. Stored names are prefixed
 * with a ULID so two uploads with the same suggested name never collide.
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import { logger } from '@storepo/shared';

export const DEFAULT_UPLOAD_NAME = 'upload.pdf';

export interface StoredUpload {
  filePath: string;
  storedName: string;
}

/** Reduce a client-supplied name to a safe basename. */
export function sanitizeFilename(name: string): string {
  const base = path.posix.basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned || DEFAULT_UPLOAD_NAME;
}

/** PDF files carry a `%PDF-` marker within their first 1024 bytes. */
export function looksLikePdf(body: Buffer): boolean {
  return body.subarray(0, 1024).includes('%PDF-');
}

export async function saveUpload(
  uploadDir: string,
  suggestedName: string,
  body: Buffer
): Promise<StoredUpload> {
  await fs.promises.mkdir(uploadDir, { recursive: true });

  const storedName = `${ulid()}-${sanitizeFilename(suggestedName)}`;
  const filePath = path.join(uploadDir, storedName);
  await fs.promises.writeFile(filePath, body, { flag: 'wx' });

  logger.info('Stored upload', { storedName, bytes: body.length });
  return { filePath, storedName };
}

/** Remove a stored upload that no record points to. Failures are logged. */
export async function discardUpload(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
    logger.info('Discarded upload', { storedName: path.basename(filePath) });
  } catch (error) {
    logger.error('Failed to discard upload', error, { filePath });
  }
}

/** Public link for a stored document path. */
export function documentLink(filePath: string): string {
  return `/PDF_storage/${encodeURIComponent(path.basename(filePath))}`;
}
