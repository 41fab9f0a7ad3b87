/**
 * Record Store
 *
 * Identifier -> document mapping. Real identifiers are unique; inserting one
 * twice is rejected with DuplicateIdentifierError. The sentinel is not unique:
 * every unresolved document keeps its own record under its surrogate id.
 */

import type { Identifier, PurchaseOrderRecord } from '../types';

export interface RecordStore {
  /** Atomic check-and-write. Throws DuplicateIdentifierError on conflict. */
  insert(identifier: Identifier, documentPath: string): Promise<PurchaseOrderRecord>;

  /** Most recent record for the identifier, or null. */
  lookup(identifier: Identifier): Promise<PurchaseOrderRecord | null>;

  getById(id: string): Promise<PurchaseOrderRecord | null>;

  /** Sentinel records, newest first. */
  listUnresolved(limit: number): Promise<PurchaseOrderRecord[]>;
}
