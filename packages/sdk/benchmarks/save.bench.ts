/**
 * Performance benchmarks for document saves
 * Run with: VITEST_PERF=1 npm test
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { open } from "../src/document.js";
import type { JsonDocument } from "../src/document.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

describeIf("Save Performance Benchmarks", () => {
  let testDir: string;
  let doc: JsonDocument;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "jawadb-bench-"));
    doc = open(join(testDir, "bench.json"), { register: false });
  });

  afterEach(async () => {
    doc.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it("10000 entries, single save < 250ms", { timeout: 30000 }, () => {
    const tasks = doc.getOrInsertList("tasks");
    for (let i = 1; i <= 10000; i++) {
      tasks.append({
        id: i,
        status: i % 3 === 0 ? "open" : i % 3 === 1 ? "closed" : "ready",
        title: `Task ${i}`,
      });
    }

    const start = Date.now();
    const wrote = doc.save();
    const duration = Date.now() - start;

    console.log(`Save of 10000 entries: ${duration}ms`);
    expect(wrote).toBe(true);
    expect(duration).toBeLessThanOrEqual(250);
  });

  it("100 small mutations, save after each < 2000ms", { timeout: 30000 }, () => {
    const counters = doc.getOrInsertMap("counters");

    const start = Date.now();
    for (let i = 0; i < 100; i++) {
      counters.set(`k${i % 10}`, i);
      doc.save();
    }
    const duration = Date.now() - start;

    console.log(`100 saves: ${duration}ms`);
    expect(doc.isDirty).toBe(false);
    expect(duration).toBeLessThanOrEqual(2000);
  });

  it("unchanged tree, save is skipped < 50ms", { timeout: 30000 }, () => {
    doc.extend(Array.from({ length: 5000 }, (_, i) => i));
    doc.save();
    doc.markModified();

    const start = Date.now();
    const wrote = doc.save();
    const duration = Date.now() - start;

    expect(wrote).toBe(false);
    expect(duration).toBeLessThanOrEqual(50);
  });
});
