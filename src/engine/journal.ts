/** State that can be captured and put back when a transaction aborts. */
export interface Revertible {
  /** Capture the current state. Calling the returned function restores it. */
  snapshot(): () => void;
}

export function isRevertible(value: unknown): value is Revertible {
  return (
    typeof value === "object" &&
    value !== null &&
    "snapshot" in value &&
    typeof value.snapshot === "function"
  );
}

/**
 * Snapshots every registered participant before a transaction and restores
 * all of them, newest first, if the transaction throws.
 */
export class StateJournal {
  private participants: Revertible[] = [];

  register(participant: Revertible): void {
    if (!this.participants.includes(participant)) {
      this.participants.push(participant);
    }
  }

  get size(): number {
    return this.participants.length;
  }

  run<T>(work: () => T): T {
    const restores = this.participants.map((p) => p.snapshot());
    try {
      return work();
    } catch (error) {
      for (const restore of restores.reverse()) restore();
      throw error;
    }
  }
}
