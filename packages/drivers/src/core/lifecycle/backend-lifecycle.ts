import { BackendNotReadyError } from "@layerconf/errors"
import type { BackendState } from "../../ports/storage-backend"

/**
 * Tracks `created → initializing → ready → closing → closed` for a backend.
 */
export class BackendLifecycle {
  private current: BackendState = "created"

  constructor(private readonly backend: string) {}

  get state(): BackendState {
    return this.current
  }

  assertReady(): void {
    if (this.current !== "ready") {
      throw new BackendNotReadyError(this.backend, this.current)
    }
  }

  async start(open: () => Promise<void>): Promise<void> {
    if (this.current === "ready") return
    if (this.current !== "created") {
      throw new BackendNotReadyError(this.backend, this.current)
    }

    this.current = "initializing"
    try {
      await open()
    } catch (err) {
      this.current = "created"
      throw err
    }
    this.current = "ready"
  }

  async stop(close: () => Promise<void>): Promise<void> {
    if (this.current === "closed" || this.current === "closing") return
    if (this.current === "created") {
      this.current = "closed"
      return
    }

    this.current = "closing"
    try {
      await close()
    } finally {
      this.current = "closed"
    }
  }
}
