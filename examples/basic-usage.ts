/**
 * Basic Usage Example
 *
 * Demonstrates tables, schemas and record CRUD with TableDB.
 * Run with: npm run examples
 */

import { openDatabase, unwrap } from "@tabledb/sdk";
import { rm } from "node:fs/promises";

async function main() {
  // Setup: start from an empty file
  const dbPath = "./examples-data/basic/tasks.json";
  await rm(dbPath, { force: true });

  console.log("📂 Opening database...");
  const db = openDatabase({ path: dbPath });

  // CREATE TABLE with a schema
  console.log("\n🧱 Creating table...");
  unwrap(
    db.createTable("tasks", {
      title: { type: "string", required: true, max_length: 80 },
      status: { type: "string", required: true },
      priority: { type: "integer" },
      tags: { type: "array" },
    })
  );
  console.log("✅ Created table tasks");

  // INSERT
  console.log("\n✏️  Inserting records...");
  const first = unwrap(
    db.insert("tasks", {
      title: "Read the docs",
      status: "open",
      priority: 8,
      tags: ["learning", "documentation"],
    })
  );
  console.log(`✅ Inserted _id ${first._id} at ${first._created_at}`);

  unwrap(db.insert("tasks", { title: "Build feature", status: "open", priority: 9, tags: ["feature"] }));
  unwrap(db.insert("tasks", { title: "Fix bug", status: "open", priority: 7, tags: ["bug", "urgent"] }));
  unwrap(db.insert("tasks", { title: "Write tests", status: "closed", priority: 5, tags: ["testing"] }));
  console.log("✅ Inserted 3 more tasks");

  // Schema violations come back as error results
  console.log("\n🚫 Inserting an invalid record...");
  const invalid = db.insert("tasks", { status: "open" });
  if (!invalid.ok) {
    console.log(`✅ Rejected: ${invalid.error.message} (${invalid.error.kind})`);
  }

  // SELECT
  console.log("\n🔍 Selecting open tasks...");
  const openTasks = unwrap(db.select("tasks", { status: "open" }));
  for (const task of openTasks) {
    console.log(`   - #${task._id}: ${task.title} (priority: ${task.priority})`);
  }

  console.log("\n🔍 Selecting high-priority tasks (>=8)...");
  const highPriority = unwrap(db.select("tasks", { priority: { $gte: 8 } }));
  console.log(`✅ Found ${highPriority.length} high-priority tasks`);

  // UPDATE
  console.log("\n✏️  Updating a task...");
  const updated = unwrap(db.update("tasks", { title: "Read the docs" }, { status: "in-progress" }));
  console.log(`✅ Updated ${updated} record(s)`);

  // DELETE
  console.log("\n🗑️  Deleting closed tasks...");
  const deleted = unwrap(db.delete("tasks", { status: "closed" }));
  console.log(`✅ Deleted ${deleted} record(s)`);

  // Final stats
  console.log("\n📊 Final stats:");
  const info = unwrap(db.getTableInfo("tasks"));
  console.log(`   Records: ${info.recordCount}`);
  console.log(`   Size: ${info.sizeBytes} bytes`);

  unwrap(db.close());
  console.log("\n✅ Example completed successfully!");
  console.log(`📁 Data stored in: ${db.path}`);
}

main().catch(console.error);
