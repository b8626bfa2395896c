import { ReentrancyError } from "../utils/errors.js";

/**
 * Per-engine mutual exclusion. Operations are synchronous, so the only way to
 * find the lock held is a nested call made from inside a running operation
 * (for example a token transfer hook calling back into the engine).
 */
export class ExecutionLock {
  private holder: string | null = null;

  get held(): boolean {
    return this.holder !== null;
  }

  /** Name of the operation currently holding the lock. */
  get heldBy(): string | null {
    return this.holder;
  }

  assertFree(operation: string): void {
    if (this.holder !== null) throw new ReentrancyError(operation);
  }

  run<T>(operation: string, work: () => T): T {
    this.assertFree(operation);
    this.holder = operation;
    try {
      return work();
    } finally {
      this.holder = null;
    }
  }
}
