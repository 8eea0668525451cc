import { LockContentionError } from '@ratesync/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface SyncLockHandle {
  readonly provider: string;
  readonly acquiredAt: Date;
  /** Idempotent; releasing a stale handle never frees a newer holder */
  release(): void;
}

/**
 * Per-provider exclusive locks. Acquisition is synchronous, so two callers on
 * the same event loop can never both succeed.
 */
export class SyncLockRegistry {
  private readonly held = new Map<string, SyncLockHandle>();

  tryAcquire(provider: string): Result<SyncLockHandle, LockContentionError> {
    if (this.held.has(provider)) {
      return err(new LockContentionError(provider));
    }

    const handle: SyncLockHandle = {
      acquiredAt: new Date(),
      provider,
      release: () => {
        if (this.held.get(provider) === handle) {
          this.held.delete(provider);
        }
      },
    };
    this.held.set(provider, handle);
    return ok(handle);
  }

  isHeld(provider: string): boolean {
    return this.held.has(provider);
  }
}
