import type { LockKey } from "./lock"

export interface LockLease {
  readonly key: LockKey

  /** Hand the key to the next waiter. Idempotent. */
  release(): Promise<void>
}
