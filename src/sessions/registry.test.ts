import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SessionNotFoundError } from "../errors.js";
import { InMemoryIndexStore } from "../retrieval/indexStore.js";
import type { IngestionStats } from "../retrieval/types.js";
import { KeywordEmbeddings, makeChunk } from "../testing/fakes.js";
import { SessionRegistry } from "./registry.js";
import { sessionFilePath } from "./sessionFile.js";

const embeddings = new KeywordEmbeddings(["apple", "banana"]);

function stats(chunkCount: number): IngestionStats {
  return {
    chunkCount,
    totalChars: 20,
    avgChunkSize: 10,
    chunkSize: 800,
    chunkOverlap: 200,
    embeddingModel: "test-embedding",
    embeddingDimension: 3,
    distanceMetric: "l2",
    sourceKind: "pdf"
  };
}

async function filledStore(): Promise<InMemoryIndexStore> {
  const store = new InMemoryIndexStore(embeddings);
  await store.add([makeChunk("apple pie", 0), makeChunk("banana bread", 1)]);
  return store;
}

describe("SessionRegistry", () => {
  it("hides pending sessions until they are committed", async () => {
    const registry = new SessionRegistry();
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });

    expect(() => registry.get(pending.sessionId)).toThrow(SessionNotFoundError);
    expect(registry.list()).toEqual([]);

    const session = await registry.commit(pending.sessionId, { stats: stats(2) });
    expect(registry.get(pending.sessionId)).toBe(session);
    expect(registry.list().map((s) => s.sessionId)).toEqual([pending.sessionId]);
  });

  it("describes a session without exposing its index", async () => {
    const registry = new SessionRegistry();
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });
    await registry.commit(pending.sessionId, { stats: stats(2), summary: "A summary" });

    const summary = registry.describe(pending.sessionId);
    expect(summary).toEqual({
      sessionId: pending.sessionId,
      sourceName: "doc.pdf",
      sourceKind: "pdf",
      createdAt: pending.createdAt,
      stats: stats(2),
      summary: "A summary"
    });
    expect("indexStore" in summary).toBe(false);
  });

  it("generates distinct UUIDs", () => {
    const registry = new SessionRegistry();
    const store = new InMemoryIndexStore(embeddings);
    const ids = new Set(
      Array.from({ length: 50 }, () => registry.create({ sourceName: "a", sourceKind: "text", indexStore: store }).sessionId)
    );
    expect(ids.size).toBe(50);
    for (const id of ids) {
      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    }
  });

  it("deletes idempotently", async () => {
    const registry = new SessionRegistry();
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });
    await registry.commit(pending.sessionId, { stats: stats(2) });

    await registry.delete(pending.sessionId);
    await expect(registry.delete(pending.sessionId)).resolves.toBeUndefined();
    await expect(registry.delete("never-existed")).resolves.toBeUndefined();
    expect(() => registry.get(pending.sessionId)).toThrow(SessionNotFoundError);
  });

  it("refuses to commit a session deleted while pending", async () => {
    const registry = new SessionRegistry();
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });
    await registry.delete(pending.sessionId);

    await expect(registry.commit(pending.sessionId, { stats: stats(2) })).rejects.toBeInstanceOf(
      SessionNotFoundError
    );
    expect(registry.list()).toEqual([]);
  });

  it("lists sessions oldest first", async () => {
    vi.useFakeTimers();
    try {
      const registry = new SessionRegistry();
      vi.setSystemTime(new Date("2026-03-02T10:00:00.000Z"));
      const later = registry.create({ sourceName: "b.pdf", sourceKind: "pdf", indexStore: await filledStore() });
      vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
      const earlier = registry.create({ sourceName: "a.pdf", sourceKind: "pdf", indexStore: await filledStore() });
      await registry.commit(later.sessionId, { stats: stats(2) });
      await registry.commit(earlier.sessionId, { stats: stats(2) });

      expect(registry.list().map((s) => s.sourceName)).toEqual(["a.pdf", "b.pdf"]);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("SessionRegistry with a session directory", () => {
  let sessionDir: string;

  beforeEach(async () => {
    sessionDir = await fs.mkdtemp(path.join(os.tmpdir(), "askdoc-sessions-"));
  });

  afterEach(async () => {
    await fs.rm(sessionDir, { recursive: true, force: true });
  });

  it("writes committed sessions and restores them", async () => {
    const registry = new SessionRegistry({ sessionDir });
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });
    await registry.commit(pending.sessionId, { stats: stats(2) });

    await expect(fs.stat(sessionFilePath(sessionDir, pending.sessionId))).resolves.toBeTruthy();

    const reopened = new SessionRegistry({ sessionDir });
    await expect(reopened.restore(embeddings)).resolves.toBe(1);

    const session = reopened.get(pending.sessionId);
    expect(session.sourceName).toBe("doc.pdf");
    expect(session.stats).toEqual(stats(2));
    expect(session.indexStore.size()).toBe(2);
    const hits = await session.indexStore.search("banana", 1);
    expect(hits.map((h) => h.chunk.text)).toEqual(["banana bread"]);
  });

  it("does not write pending sessions", async () => {
    const registry = new SessionRegistry({ sessionDir });
    registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });

    expect(await fs.readdir(sessionDir)).toEqual([]);
  });

  it("removes the session file on delete", async () => {
    const registry = new SessionRegistry({ sessionDir });
    const pending = registry.create({ sourceName: "doc.pdf", sourceKind: "pdf", indexStore: await filledStore() });
    await registry.commit(pending.sessionId, { stats: stats(2) });

    await registry.delete(pending.sessionId);
    expect(await fs.readdir(sessionDir)).toEqual([]);
  });

  it("skips malformed session files with a warning", async () => {
    await fs.writeFile(path.join(sessionDir, "broken.json"), "{ not json", "utf-8");
    await fs.writeFile(path.join(sessionDir, "wrong-shape.json"), JSON.stringify({ version: 2 }), "utf-8");
    const log = { info: vi.fn(), warn: vi.fn() };

    const registry = new SessionRegistry({ sessionDir, log });
    await expect(registry.restore(embeddings)).resolves.toBe(0);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(registry.list()).toEqual([]);
  });

  it("restores nothing from a missing directory", async () => {
    const registry = new SessionRegistry({ sessionDir: path.join(sessionDir, "missing") });
    await expect(registry.restore(embeddings)).resolves.toBe(0);
  });
});
