/**
 * Advanced Queries Example
 *
 * Demonstrates operators, aggregation, transactions, import/export and
 * backups.
 * Run with: npm run examples
 */

import { openDatabase, unwrap, ValidationError } from "@tabledb/sdk";
import { rm } from "node:fs/promises";

async function main() {
  const dbPath = "./examples-data/advanced/shop.json";
  await rm("./examples-data/advanced", { recursive: true, force: true });

  const db = openDatabase({ path: dbPath, logging: true, logLevel: "warn" });
  unwrap(
    db.createTable("products", {
      name: { type: "string", required: true },
      category: { type: "string", required: true },
      price: { type: "number", required: true },
    })
  );

  // Import a batch; bad rows are counted, not fatal
  console.log("📥 Importing products...");
  const summary = unwrap(
    db.importRecords("products", [
      { name: "Laptop Pro", category: "electronics", price: 1999 },
      { name: "Laptop Air", category: "electronics", price: 1299 },
      { name: "Desk Lamp", category: "home", price: 49.5 },
      { name: "Office Chair", category: "home", price: 320 },
      { name: "Coffee Beans", category: "grocery", price: 18 },
      { name: "Mystery Box", category: "misc" },
    ])
  );
  console.log(`✅ ${summary.imported} imported, ${summary.errors} rejected\n`);

  // Range and substring operators
  console.log("🔍 Products between 40 and 400:");
  for (const p of unwrap(db.select("products", { price: { $gte: 40, $lte: 400 } }))) {
    console.log(`   - ${p.name}: ${p.price}`);
  }

  console.log("\n🔍 Products whose name contains 'laptop' (case-insensitive):");
  for (const p of unwrap(db.select("products", { name: { $like: "laptop" } }))) {
    console.log(`   - ${p.name}`);
  }

  console.log("\n📄 Second page (2 per page):");
  for (const p of unwrap(db.select("products", {}, { limit: 2, offset: 2 }))) {
    console.log(`   - #${p._id} ${p.name}`);
  }

  // Aggregation
  console.log("\n📊 Products per category over 20:");
  const groups = unwrap(
    db.aggregate("products", [
      { $match: { price: { $gt: 20 } } },
      { $group: { _id: "category" } },
    ])
  );
  for (const group of groups) {
    console.log(`   ${String(group._id)}: ${group.count}`);
  }

  // Transactions: all or nothing
  console.log("\n🔁 Running a failing transaction...");
  const failed = db.transaction((tx) => {
    unwrap(tx.update("products", { category: "home" }, { price: 0 }));
    throw new ValidationError("price check failed");
  });
  if (!failed.ok) {
    const lamp = unwrap(db.select("products", { name: "Desk Lamp" }))[0];
    console.log(`✅ Rolled back (${failed.error.message}); Desk Lamp still costs ${lamp?.price}`);
  }

  // Backup, change, restore
  console.log("\n💾 Backing up...");
  const backupPath = unwrap(db.backup());
  unwrap(db.delete("products", { category: "grocery" }));
  console.log(`   Products after delete: ${unwrap(db.count("products"))}`);
  unwrap(db.restore(backupPath));
  console.log(`✅ Restored from ${backupPath}: ${unwrap(db.count("products"))} products`);

  // Statements, analysis and export
  console.log(`\n🧮 ${unwrap(db.execute("SELECT COUNT(*) FROM products"))} products via execute()`);
  console.log("🔬 Column types:", unwrap(db.analyzeTable("products")).dataTypes);
  console.log("📤 Export of home products:");
  console.log(unwrap(db.exportRecords("products", { category: "home" })));

  unwrap(db.close());
  console.log("\n✅ Example completed successfully!");
}

main().catch(console.error);
