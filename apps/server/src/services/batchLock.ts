import { BatchInProgressError } from "../errors.js";

export interface BatchLockStatus {
  holder: string | null;
  dirty: boolean;
  resetting: boolean;
  acquiredAt: string | null;
}

const RESET_HOLDER = "working-area-reset";

/**
 * Guards the shared working prefix and working tables. Only one batch may hold it,
 * and a dirty lock (scratch data never reset) stays held until a reset finishes.
 * While a reset runs, nothing may acquire the lock.
 */
export class BatchLock {
  private holder: string | null = null;
  private dirty = false;
  private resetting = false;
  private acquiredAt: string | null = null;

  acquire(batchName: string): void {
    if (this.resetting) {
      throw new BatchInProgressError(this.holder ?? RESET_HOLDER, "resetting");
    }
    if (this.holder !== null) {
      throw new BatchInProgressError(this.holder, this.dirty ? "dirty" : "running");
    }
    this.holder = batchName;
    this.dirty = false;
    this.acquiredAt = new Date().toISOString();
  }

  release(batchName: string): void {
    if (this.holder !== batchName || this.dirty) return;
    this.holder = null;
    this.acquiredAt = null;
  }

  markDirty(batchName: string): void {
    this.holder = batchName;
    this.dirty = true;
    if (!this.acquiredAt) this.acquiredAt = new Date().toISOString();
  }

  /**
   * Claims the working area for a reset. Allowed when the lock is free or dirty;
   * refused while a batch is running or another reset is under way.
   */
  beginReset(): string | null {
    if (this.resetting) {
      throw new BatchInProgressError(this.holder ?? RESET_HOLDER, "resetting");
    }
    if (this.holder !== null && !this.dirty) {
      throw new BatchInProgressError(this.holder, "running");
    }
    this.resetting = true;
    return this.holder;
  }

  /** A successful reset frees the lock; a failed one leaves the previous holder in place. */
  finishReset(succeeded: boolean): void {
    if (!this.resetting) return;
    this.resetting = false;
    if (!succeeded) return;
    this.holder = null;
    this.dirty = false;
    this.acquiredAt = null;
  }

  status(): BatchLockStatus {
    return { holder: this.holder, dirty: this.dirty, resetting: this.resetting, acquiredAt: this.acquiredAt };
  }
}
