import { createHash } from 'crypto';
import { IdempotencyConflictError } from '../utils/errors';
import type { AssignmentResult } from '../utils/types';

interface IdempotencyEntry {
  result: AssignmentResult;
  createdAt: number;
  fingerprint: string;
}

/**
 * @brief Request fingerprint: the floors of the call, hashed
 */
export function fingerprintRequest(fromFloor: number, toFloor: number): string {
  return createHash('sha256').update(JSON.stringify({ fromFloor, toFloor })).digest('hex');
}

/**
 * @brief In-memory TTL cache of assignment results keyed by idempotency key
 * @description Not synchronised on its own; the dispatcher only touches it under the fleet lock.
 */
export class IdempotencyStore {
  private entries: Map<string, IdempotencyEntry> = new Map();

  /**
   * @param ttlMs - Entry lifetime in milliseconds
   * @param now - Clock, replaceable in tests
   */
  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * @brief Drop every entry older than the TTL
   * @returns Number of entries evicted
   */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (entry.createdAt < cutoff) {
        this.entries.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  /**
   * @brief Look up a live entry
   * @returns The stored result, or undefined when the key is unknown
   * @throws IdempotencyConflictError when the key was stored for a different request
   */
  lookup(key: string, fingerprint: string): AssignmentResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.fingerprint !== fingerprint) {
      throw new IdempotencyConflictError(key);
    }
    return entry.result;
  }

  store(key: string, fingerprint: string, result: AssignmentResult): void {
    this.entries.set(key, { result, fingerprint, createdAt: this.now() });
  }

  get size(): number {
    return this.entries.size;
  }
}
