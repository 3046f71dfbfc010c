/**
 * Exclusive Lock
 * Serializes access to FileSet state shared by the set and its files
 */

import { ContractError } from '../error-classes.js';

/**
 * One lock per FileSet, shared with every SourceFile it creates.
 *
 * FileSet operations are synchronous and never yield, so two callers can
 * never interleave inside a critical section. What can still happen is
 * re-entry from the same call stack, e.g. a callback registered by the
 * caller mutating the set mid-resolution. That is rejected.
 */
export class ExclusiveLock {
  private holder: string | undefined;

  run<T>(operation: string, fn: () => T): T {
    if (this.holder !== undefined) {
      throw new ContractError('TF-C007', { operation: this.holder });
    }
    this.holder = operation;
    try {
      return fn();
    } finally {
      this.holder = undefined;
    }
  }
}
