/**
 * po-parse command
 *
 * Parses one PDF and reports its store-PO identifier as a single JSON line:
 *   {"po_number": "436-10432"}        exit 0
 *   {"error": "No text extracted"}    exit 1
 * Nothing is persisted.
 */

import fs from 'fs';
import {
  logger,
  isPipelineError,
  publicMessage,
  validateParseResult,
  ResponseFormatError,
  type ParseResultLine,
  type PurchaseOrderPipeline,
} from '@storepo/shared';

export interface CliResult {
  output: ParseResultLine;
  exitCode: number;
}

function fail(output: ParseResultLine): CliResult {
  return { output, exitCode: 1 };
}

async function parseFile(
  filePath: string,
  pipeline: Pick<PurchaseOrderPipeline, 'parse'>
): Promise<CliResult> {
  if (!fs.existsSync(filePath)) {
    return fail({ error: `File not found: ${filePath}` });
  }

  try {
    const parsed = await pipeline.parse(filePath);
    return { output: { po_number: parsed.identifier }, exitCode: 0 };
  } catch (error) {
    if (error instanceof ResponseFormatError) {
      return fail({ error: publicMessage(error), raw: error.raw });
    }
    if (isPipelineError(error)) {
      return fail({ error: publicMessage(error) });
    }
    return fail({ error: error instanceof Error ? error.message : String(error) });
  }
}

export async function runCli(
  args: string[],
  pipeline: Pick<PurchaseOrderPipeline, 'parse'>
): Promise<CliResult> {
  const [filePath] = args;
  const result = filePath
    ? await parseFile(filePath, pipeline)
    : fail({ error: 'No file path provided' });

  const validation = validateParseResult(result.output);
  if (!validation.valid) {
    logger.warn('ParseResult validation failed', { errors: validation.errors });
  }

  return result;
}
