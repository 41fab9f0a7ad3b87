/**
 * po-parse entry point
 *
 * Usage: po-parse <file.pdf>
 * Logs go to stderr; stdout carries only the result line.
 */

import { ulid } from 'ulid';
import {
  configureLogger,
  createDefaultPipeline,
  logger,
  runWithContextAsync,
} from '@storepo/shared';
import { runCli } from './cli';

configureLogger({ stream: 'stderr' });

runWithContextAsync({ correlationId: ulid(), source: 'cli' }, () =>
  runCli(process.argv.slice(2), createDefaultPipeline())
)
  .then(({ output, exitCode }) => {
    process.stdout.write(`${JSON.stringify(output)}\n`, () => process.exit(exitCode));
  })
  .catch((error) => {
    logger.error('po-parse crashed', error);
    process.stdout.write(`${JSON.stringify({ error: 'Internal error' })}\n`, () => process.exit(1));
  });
