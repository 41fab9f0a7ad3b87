/**
 * Store Allow-List and Identifier Grammar
 *
 * The approved store codes are compiled-in configuration. Components that need
 * them take a StoreAllowList at construction so tests can substitute their own.
 */

import { SENTINEL_IDENTIFIER, type Identifier } from './types';

export const APPROVED_STORE_CODES = ['829', '899', '436', '499', '407', '115', '712'] as const;

const IDENTIFIER_PATTERN = /^(\d{3})-(\d{5})$/;

export class StoreAllowList {
  private readonly codes: ReadonlySet<string>;

  constructor(codes: Iterable<string>) {
    this.codes = new Set(codes);
  }

  has(code: string): boolean {
    return this.codes.has(code);
  }

  /** Codes in declaration order, as shown to the model. */
  list(): readonly string[] {
    return [...this.codes];
  }
}

export const DEFAULT_STORE_ALLOW_LIST = new StoreAllowList(APPROVED_STORE_CODES);

/** True if the value has the `DDD-DDDDD` shape (store code not checked). */
export function isWellFormedIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export function isSentinel(identifier: Identifier): boolean {
  return identifier === SENTINEL_IDENTIFIER;
}
