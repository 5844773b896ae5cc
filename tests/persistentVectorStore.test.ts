import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistentVectorStore } from "../src/infra/store/persistentVectorStore.js";

describe("PersistentVectorStore", () => {
  let tmpDir: string;
  let indexPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "vector-store-"));
    indexPath = path.join(tmpDir, "nested", "vector-index.json");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("restores chunks after restart", async () => {
    const first = new PersistentVectorStore(indexPath, { maxBytes: 1024 * 1024 });
    await first.initialize();
    await first.replaceAll([
      { content: "Pricing starts with a pilot.", source: "pricing.txt", sequenceNo: 0, embedding: [1, 0] },
      { content: "Support runs all week.", source: "support.txt", sequenceNo: 0, embedding: [0, 1] },
    ]);
    await first.close();

    const second = new PersistentVectorStore(indexPath, { maxBytes: 1024 * 1024 });
    await second.initialize();

    expect(await second.stats()).toEqual({
      chunkCount: 2,
      sources: ["pricing.txt", "support.txt"],
    });
    const hits = await second.similaritySearch([0, 1], 1);
    expect(hits[0].chunk.source).toBe("support.txt");
  });

  it("writes a versioned file", async () => {
    const store = new PersistentVectorStore(indexPath, { maxBytes: 1024 * 1024 });
    await store.initialize();
    await store.replaceAll([{ content: "x", source: "x.txt", sequenceNo: 0, embedding: [0.5] }]);

    const saved = JSON.parse(await fs.readFile(indexPath, "utf-8"));
    expect(saved.format_version).toBe(1);
    expect(saved.chunks).toEqual([{ content: "x", source: "x.txt", sequenceNo: 0, embedding: [0.5] }]);
  });

  it("rejects snapshots over the size limit", async () => {
    const store = new PersistentVectorStore(indexPath, { maxBytes: 32 });
    await store.initialize();

    await expect(
      store.replaceAll([
        { content: "a long enough chunk to pass the limit", source: "big.txt", sequenceNo: 0, embedding: [1] },
      ]),
    ).rejects.toThrow("exceeds size limit");
  });

  it("keeps serving and restoring the previous set when a write fails", async () => {
    const store = new PersistentVectorStore(indexPath, { maxBytes: 400 });
    await store.initialize();
    await store.replaceAll([{ content: "old", source: "old.txt", sequenceNo: 0, embedding: [1, 0] }]);

    await expect(
      store.replaceAll([
        { content: "x".repeat(500), source: "new.txt", sequenceNo: 0, embedding: [1, 0] },
      ]),
    ).rejects.toThrow("exceeds size limit");

    const hits = await store.similaritySearch([1, 0], 1);
    expect(hits.map((hit) => hit.chunk.source)).toEqual(["old.txt"]);

    const restarted = new PersistentVectorStore(indexPath, { maxBytes: 400 });
    await restarted.initialize();
    expect(await restarted.stats()).toEqual({ chunkCount: 1, sources: ["old.txt"] });
  });

  it("rejects a malformed index file", async () => {
    await fs.mkdir(path.dirname(indexPath), { recursive: true });
    await fs.writeFile(indexPath, JSON.stringify({ format_version: 9, chunks: "nope" }), "utf-8");

    const store = new PersistentVectorStore(indexPath, { maxBytes: 1024 });
    await expect(store.initialize()).rejects.toThrow("Invalid vector index file format");
  });
});
