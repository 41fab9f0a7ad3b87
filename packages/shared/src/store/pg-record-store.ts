/**
 * PostgreSQL Record Store
 *
 * Uniqueness lives in the partial unique index
 * `purchase_orders_po_number_key ... WHERE po_number <> 'UNKNOWN'`, so an
 * insert is one statement and concurrent uploads cannot both claim an identifier.
 */

import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { dbQueryDurationHistogram } from '../metrics';
import { DuplicateIdentifierError } from '../errors';
import type { Identifier, PurchaseOrderRecord } from '../types';
import type { RecordStore } from './record-store';

// A type alias, not an interface: pg's row constraint needs an index signature
export type PurchaseOrderRow = {
  id: string;
  po_number: string;
  pdf_path: string;
  created_at: Date;
};

/** The slice of a pg Pool this store uses. */
export interface SqlExecutor {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: PurchaseOrderRow[]; rowCount: number | null }>;
}

const RECORD_COLUMNS = 'id, po_number, pdf_path, created_at';

export function createPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

/** Adapt a pg Pool to the executor this store expects. */
export function poolExecutor(pool: Pool): SqlExecutor {
  return {
    query: (text, values) => pool.query<PurchaseOrderRow>(text, values),
  };
}

function toRecord(row: PurchaseOrderRow): PurchaseOrderRecord {
  return {
    id: row.id,
    po_number: row.po_number,
    pdf_path: row.pdf_path,
    created_at: row.created_at.toISOString(),
  };
}

export class PgRecordStore implements RecordStore {
  constructor(private readonly db: SqlExecutor) {}

  async insert(identifier: Identifier, documentPath: string): Promise<PurchaseOrderRecord> {
    const result = await this.timed('insert_record', () =>
      this.db.query(
        `INSERT INTO purchase_orders (id, po_number, pdf_path)
         VALUES ($1, $2, $3)
         ON CONFLICT (po_number) WHERE po_number <> 'UNKNOWN' DO NOTHING
         RETURNING ${RECORD_COLUMNS}`,
        [uuidv4(), identifier, documentPath]
      )
    );

    const row = result.rows[0];
    if (!row) {
      logger.warn('Identifier already recorded', { po_number: identifier, pdf_path: documentPath });
      throw new DuplicateIdentifierError(identifier);
    }

    logger.info('Persisted purchase order record', { id: row.id, po_number: row.po_number });
    return toRecord(row);
  }

  async lookup(identifier: Identifier): Promise<PurchaseOrderRecord | null> {
    const result = await this.timed('lookup_record', () =>
      this.db.query(
        `SELECT ${RECORD_COLUMNS}
         FROM purchase_orders
         WHERE po_number = $1
         ORDER BY created_at DESC
         LIMIT 1`,
        [identifier]
      )
    );
    const row = result.rows[0];
    return row ? toRecord(row) : null;
  }

  async getById(id: string): Promise<PurchaseOrderRecord | null> {
    const result = await this.timed('get_record', () =>
      this.db.query(`SELECT ${RECORD_COLUMNS} FROM purchase_orders WHERE id = $1`, [id])
    );
    const row = result.rows[0];
    return row ? toRecord(row) : null;
  }

  async listUnresolved(limit: number): Promise<PurchaseOrderRecord[]> {
    const result = await this.timed('list_unresolved', () =>
      this.db.query(
        `SELECT ${RECORD_COLUMNS}
         FROM purchase_orders
         WHERE po_number = 'UNKNOWN'
         ORDER BY created_at DESC
         LIMIT $1`,
        [limit]
      )
    );
    return result.rows.map(toRecord);
  }

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }
}
