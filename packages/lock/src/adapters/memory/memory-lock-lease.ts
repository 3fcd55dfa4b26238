import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export class MemoryLease implements LockLease {
  private released = false

  constructor(
    readonly key: LockKey,
    private readonly deps: MemoryLeaseDeps,
  ) {}

  async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.deps.onRelease()
  }
}
