/**
 * Performance benchmarks for query execution
 * Run with: npm run bench
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase, type Database } from "../src/database.js";
import { unwrap } from "../src/result.js";

const STATUSES = ["open", "closed", "ready"];

describe("Query Performance Benchmarks", () => {
  let testDir: string;
  let db: Database;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "tabledb-bench-"));
    db = openDatabase({ path: join(testDir, "bench.json") });
    unwrap(db.createTable("tasks"));
    unwrap(
      db.transaction((tx) => {
        for (let i = 1; i <= 10000; i++) {
          unwrap(
            tx.insert("tasks", {
              status: STATUSES[i % STATUSES.length] ?? "open",
              priority: (i % 10) + 1,
              title: `Task ${i}`,
            })
          );
        }
      })
    );
  });

  afterEach(async () => {
    db.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it("10k records, equality full scan < 50ms", () => {
    const start = performance.now();
    const rows = unwrap(db.select("tasks", { status: "open" }));
    const duration = performance.now() - start;

    console.log(`Full scan: ${rows.length} results in ${duration.toFixed(1)}ms`);
    expect(rows.length).toBe(3333);
    expect(duration).toBeLessThan(50);
  });

  it("10k records, indexed equality faster than the scan", () => {
    let start = performance.now();
    unwrap(db.select("tasks", { status: "open", priority: { $gte: 1 } }));
    const scanned = performance.now() - start;

    unwrap(db.createIndex("tasks", "status"));
    start = performance.now();
    const rows = unwrap(db.select("tasks", { status: "open" }));
    const indexed = performance.now() - start;

    console.log(`Scan ${scanned.toFixed(1)}ms vs index ${indexed.toFixed(1)}ms`);
    expect(rows.length).toBe(3333);
    expect(indexed).toBeLessThan(scanned);
  });

  it("10k records, range + $like scan < 100ms", () => {
    const start = performance.now();
    const rows = unwrap(
      db.select("tasks", { priority: { $gte: 5, $lt: 8 }, title: { $like: "task 1" } })
    );
    const duration = performance.now() - start;

    console.log(`Range + like: ${rows.length} results in ${duration.toFixed(1)}ms`);
    expect(rows.length).toBeGreaterThan(0);
    expect(duration).toBeLessThan(100);
  });

  it("commits 10k inserts in one transaction < 2000ms", () => {
    unwrap(db.createTable("bulk"));
    const start = performance.now();
    unwrap(
      db.transaction((tx) => {
        for (let i = 0; i < 10000; i++) {
          unwrap(tx.insert("bulk", { n: i }));
        }
      })
    );
    const duration = performance.now() - start;

    console.log(`Bulk insert: ${duration.toFixed(1)}ms`);
    expect(unwrap(db.count("bulk"))).toBe(10000);
    expect(duration).toBeLessThan(2000);
  });
});
