/**
 * Snapshot transactions
 *
 * States: idle → active → (committing | rolling_back) → idle.
 * Only one transaction may be active per database; nesting is an error.
 */

import { NoActiveTransactionError, TransactionActiveError } from "./errors.js";
import type { IndexColumns } from "./indexes.js";
import type { StoredRecord, TableSchema } from "./types.js";

export type TransactionState = "idle" | "active" | "committing" | "rolling_back";

/**
 * Independent deep copy of everything a transaction may change
 */
export interface Snapshot {
  tables: Record<string, StoredRecord[]>;
  schemas: Record<string, TableSchema>;
  indexes: IndexColumns;
}

/**
 * Tracks the transaction state and the snapshot taken at `begin`
 */
export class TransactionManager {
  #state: TransactionState = "idle";
  #snapshot: Snapshot | null = null;

  get state(): TransactionState {
    return this.#state;
  }

  /**
   * True from `begin` until the transaction is back to idle.
   * Persistence is suppressed while this holds.
   */
  get active(): boolean {
    return this.#state !== "idle";
  }

  /**
   * Start a transaction, keeping a copy of `snapshot`
   * @throws TransactionActiveError if one is already active
   */
  begin(snapshot: Snapshot): void {
    if (this.#state !== "idle") {
      throw new TransactionActiveError();
    }
    this.#snapshot = structuredClone(snapshot);
    this.#state = "active";
  }

  /**
   * Finish the transaction; `persist` runs while the state is `committing`
   * @throws NoActiveTransactionError if none is active
   */
  commit<T>(persist: () => T): T {
    this.#requireActive();
    this.#state = "committing";
    try {
      return persist();
    } finally {
      this.#snapshot = null;
      this.#state = "idle";
    }
  }

  /**
   * Abort the transaction; `restore` receives the snapshot taken at `begin`
   * @throws NoActiveTransactionError if none is active
   */
  rollback(restore: (snapshot: Snapshot) => void): void {
    const snapshot = this.#requireActive();
    this.#state = "rolling_back";
    try {
      restore(snapshot);
    } finally {
      this.#snapshot = null;
      this.#state = "idle";
    }
  }

  #requireActive(): Snapshot {
    if (this.#state !== "active" || !this.#snapshot) {
      throw new NoActiveTransactionError();
    }
    return this.#snapshot;
  }
}
