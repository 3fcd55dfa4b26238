import type { LockLease } from "./lock-lease"

export type LockKey = string

/**
 * Exclusive, keyed, in-process lock.
 *
 * Waiters on the same key are served in arrival order.
 */
export interface Lock {
  /** Wait until `key` is free and take it. */
  acquire(key: LockKey): Promise<LockLease>
}
