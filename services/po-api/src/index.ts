/**
 * PO API
 *
 * Upload purchase-order PDFs and look them up by store-PO identifier.
 */

import {
  logger,
  config,
  createDefaultPipeline,
  createPool,
  poolExecutor,
  PgRecordStore,
} from '@storepo/shared';
import { createApp } from './app';

const pool = createPool(config.databaseUrl);
const store = new PgRecordStore(poolExecutor(pool));
const pipeline = createDefaultPipeline({ store });

const app = createApp({
  pipeline,
  store,
  uploadDir: config.uploadDir,
  maxUploadBytes: config.maxUploadBytes,
  checkDatabase: async () => {
    await pool.query('SELECT 1');
  },
});

// Start server
const server = app.listen(config.port, () => {
  logger.info('PO API started', {
    port: config.port,
    uploadDir: config.uploadDir,
    llmModel: config.llmModel,
  });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await pool.end();
  process.exit(0);
}

function handleSignal(signal: string) {
  shutdown(signal).catch((error) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));
