/**
 * Indexes Example
 *
 * Demonstrates equality indexes, query plans and index metrics.
 * Run with: npm run examples
 */

import { openDatabase, unwrap } from "@tabledb/sdk";
import { rm } from "node:fs/promises";

async function main() {
  const dbPath = "./examples-data/indexes/tasks.json";
  await rm(dbPath, { force: true });

  console.log("📂 Opening database...\n");
  const db = openDatabase({ path: dbPath });
  unwrap(db.createTable("tasks"));

  // Bulk load in one transaction: a single write at commit
  console.log("✏️  Creating sample data...");
  const statuses = ["open", "in-progress", "blocked", "closed"];
  const priorities = [5, 6, 7, 8, 9, 10];

  unwrap(
    db.transaction((tx) => {
      for (let i = 1; i <= 1000; i++) {
        unwrap(
          tx.insert("tasks", {
            title: `Task ${i}`,
            status: statuses[i % statuses.length] ?? "open",
            priority: priorities[i % priorities.length] ?? 5,
          })
        );
      }
    })
  );
  console.log("✅ Created 1000 tasks\n");

  // Full scan
  console.log("🔍 Querying blocked tasks without an index...");
  console.log(`   Plan: ${JSON.stringify(unwrap(db.explain("tasks", { status: "blocked" })))}`);
  let start = Date.now();
  const scanned = unwrap(db.select("tasks", { status: "blocked" }));
  console.log(`✅ Found ${scanned.length} tasks in ${Date.now() - start}ms\n`);

  // Index scan
  console.log("📇 Creating index on status...");
  unwrap(db.createIndex("tasks", "status"));
  console.log(`   Plan: ${JSON.stringify(unwrap(db.explain("tasks", { status: "blocked" })))}`);
  start = Date.now();
  const indexed = unwrap(db.select("tasks", { status: "blocked" }));
  console.log(`✅ Found ${indexed.length} tasks in ${Date.now() - start}ms\n`);

  // Multi-field conditions fall back to a scan
  console.log("🔍 Querying blocked tasks with priority >= 9...");
  const urgent = unwrap(db.select("tasks", { status: "blocked", priority: { $gte: 9 } }));
  console.log(`✅ Found ${urgent.length} tasks\n`);

  console.log("📊 Index metrics:");
  for (const [key, metrics] of Object.entries(db.indexMetrics())) {
    console.log(`   ${key}: ${metrics.hitCount} hits, ${metrics.missCount} misses, ${metrics.keys} keys`);
  }

  unwrap(db.close());
  console.log("\n✅ Example completed successfully!");
}

main().catch(console.error);
