/**
 * Basic Usage Example
 *
 * Demonstrates opening a document, mutating nested values and saving.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { open, withDocument } from "@jawadb/sdk";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";

async function main() {
  // Setup: Create temporary data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });
  const file = join(dataDir, "app.json");

  // Open document; a missing file starts out empty
  console.log("📂 Opening document...");
  const doc = open(file);
  console.log(`   Root kind: ${doc.kind}`);

  // Nested containers are created on first use
  console.log("\n✏️  Recording events...");
  doc.getOrInsertList("events").append({ type: "started", at: new Date().toISOString() });
  doc.getOrInsertMap("settings").set("theme", "dark");
  console.log(`   Dirty: ${doc.isDirty}`);

  // Save writes <file>.tmp and renames it over <file>
  console.log("\n💾 Saving...");
  console.log(`   Wrote file: ${doc.save()}`);
  console.log(`   Saving again writes nothing: ${!doc.save()}`);

  // Reads never change the file
  console.log("\n📖 Reading back...");
  console.log(`   Theme: ${String(doc.getMap("settings")?.get("theme"))}`);
  console.log(`   Keys: ${doc.keys().join(", ")}`);
  doc.close();

  // Scoped access closes (and saves) automatically
  console.log("\n🔁 Scoped update...");
  await withDocument(file, (scoped) => {
    scoped.getOrInsertList("events").append({ type: "stopped" });
  });

  await withDocument(file, (scoped) => {
    console.log(scoped.toString());
  });

  // Unsaved changes are flushed when the process exits
  const pending = open(file);
  pending.getOrInsertMap("settings").set("language", "en");
  console.log("\n✅ Done. Pending change will be saved on exit.");
}

main().catch((error: unknown) => {
  console.error("❌ Error:", error);
  process.exit(1);
});
