import { describe, it, expect } from "vitest";
import { TransactionManager, type Snapshot } from "./transaction.js";
import { NoActiveTransactionError, TransactionActiveError } from "./errors.js";

function snapshot(): Snapshot {
  return {
    tables: { users: [{ _id: 1, name: "ab" }] },
    schemas: { users: { name: { type: "string" } } },
    indexes: { users: ["name"] },
  };
}

describe("TransactionManager", () => {
  it("starts idle", () => {
    const manager = new TransactionManager();
    expect(manager.state).toBe("idle");
    expect(manager.active).toBe(false);
  });

  it("rejects a nested begin", () => {
    const manager = new TransactionManager();
    manager.begin(snapshot());
    expect(() => manager.begin(snapshot())).toThrow(TransactionActiveError);
    expect(manager.state).toBe("active");
  });

  it("runs the commit callback in the committing state", () => {
    const manager = new TransactionManager();
    manager.begin(snapshot());
    const seen = manager.commit(() => manager.state);
    expect(seen).toBe("committing");
    expect(manager.state).toBe("idle");
  });

  it("returns to idle when the commit callback throws", () => {
    const manager = new TransactionManager();
    manager.begin(snapshot());
    expect(() =>
      manager.commit(() => {
        throw new Error("disk full");
      })
    ).toThrow("disk full");
    expect(manager.state).toBe("idle");
  });

  it("hands rollback an independent copy of the snapshot", () => {
    const manager = new TransactionManager();
    const original = snapshot();
    manager.begin(original);
    original.tables.users?.push({ _id: 2, name: "cd" });

    let restored: Snapshot | undefined;
    manager.rollback((s) => {
      expect(manager.state).toBe("rolling_back");
      restored = s;
    });

    expect(restored).toEqual(snapshot());
    expect(manager.state).toBe("idle");
  });

  it("rejects commit and rollback without a transaction", () => {
    const manager = new TransactionManager();
    expect(() => manager.commit(() => undefined)).toThrow(NoActiveTransactionError);
    expect(() => manager.rollback(() => undefined)).toThrow(NoActiveTransactionError);
  });
});
