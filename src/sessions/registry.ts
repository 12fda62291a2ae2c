import crypto from "node:crypto";

import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { SessionNotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { InMemoryIndexStore, type IndexStore } from "../retrieval/indexStore.js";
import type { IngestionStats, SourceKind, StoredSession } from "../retrieval/types.js";
import {
  deleteSessionFile,
  listSessionFiles,
  loadSessionFile,
  saveSessionFile
} from "./sessionFile.js";

export type SessionSummary = {
  readonly sessionId: string;
  readonly sourceName: string;
  readonly sourceKind: SourceKind;
  readonly createdAt: string;
  readonly stats: IngestionStats;
  readonly summary?: string;
};

export type Session = SessionSummary & {
  readonly indexStore: IndexStore;
};

export type PendingSession = Omit<Session, "stats" | "summary">;

type Slot =
  | { state: "pending"; session: PendingSession }
  | { state: "committed"; session: Session };

function summarize(session: Session): SessionSummary {
  return {
    sessionId: session.sessionId,
    sourceName: session.sourceName,
    sourceKind: session.sourceKind,
    createdAt: session.createdAt,
    stats: session.stats,
    ...(session.summary != null ? { summary: session.summary } : {})
  };
}

/**
 * Owns every session and its index store.
 *
 * A session is created pending, filled by ingestion, then committed. Only
 * committed sessions are visible to `get` and `list`, so a query never sees a
 * half-built index. With a `sessionDir`, committed sessions are also written to
 * disk and can be brought back with `restore`.
 */
export class SessionRegistry {
  private readonly slots = new Map<string, Slot>();
  private readonly sessionDir: string | undefined;
  private readonly log: Logger;

  constructor(params: { sessionDir?: string; log?: Logger } = {}) {
    this.sessionDir = params.sessionDir;
    this.log = params.log ?? silentLogger;
  }

  create(params: {
    sourceName: string;
    sourceKind: SourceKind;
    indexStore: IndexStore;
  }): PendingSession {
    let sessionId = crypto.randomUUID();
    while (this.slots.has(sessionId)) {
      sessionId = crypto.randomUUID();
    }

    const session: PendingSession = {
      sessionId,
      sourceName: params.sourceName,
      sourceKind: params.sourceKind,
      createdAt: new Date().toISOString(),
      indexStore: params.indexStore
    };
    this.slots.set(sessionId, { state: "pending", session });
    return session;
  }

  async commit(
    sessionId: string,
    details: { stats: IngestionStats; summary?: string }
  ): Promise<Session> {
    const slot = this.slots.get(sessionId);
    if (!slot || slot.state !== "pending") {
      throw new SessionNotFoundError(sessionId);
    }

    const session: Session = {
      ...slot.session,
      stats: details.stats,
      ...(details.summary != null ? { summary: details.summary } : {})
    };

    if (this.sessionDir) {
      await saveSessionFile(this.sessionDir, toStoredSession(session));
    }

    // Deleted while the file was being written.
    if (this.slots.get(sessionId) !== slot) {
      if (this.sessionDir) await deleteSessionFile(this.sessionDir, sessionId);
      throw new SessionNotFoundError(sessionId);
    }

    this.slots.set(sessionId, { state: "committed", session });
    this.log.info(`[Sessions] Registered ${sessionId} (${session.stats.chunkCount} chunks)`);
    return session;
  }

  get(sessionId: string): Session {
    const slot = this.slots.get(sessionId);
    if (!slot || slot.state !== "committed") {
      throw new SessionNotFoundError(sessionId);
    }
    return slot.session;
  }

  describe(sessionId: string): SessionSummary {
    return summarize(this.get(sessionId));
  }

  async delete(sessionId: string): Promise<void> {
    const existed = this.slots.delete(sessionId);
    if (this.sessionDir) {
      await deleteSessionFile(this.sessionDir, sessionId);
    }
    if (existed) this.log.info(`[Sessions] Deleted ${sessionId}`);
  }

  list(): SessionSummary[] {
    const out: SessionSummary[] = [];
    for (const slot of this.slots.values()) {
      if (slot.state === "committed") out.push(summarize(slot.session));
    }
    return out.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /** Loads every session file from `sessionDir`. Returns how many were loaded. */
  async restore(embeddings: EmbeddingsInterface): Promise<number> {
    if (!this.sessionDir) return 0;

    let loaded = 0;
    for (const filePath of await listSessionFiles(this.sessionDir)) {
      let stored: StoredSession;
      let indexStore: InMemoryIndexStore;
      try {
        stored = await loadSessionFile(filePath);
        indexStore = InMemoryIndexStore.fromStored({
          embeddings,
          metric: stored.metric,
          dimension: stored.embeddingDimension,
          chunks: stored.chunks
        });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.log.warn(`[Sessions] Skipping ${filePath}: ${message}`);
        continue;
      }
      if (this.slots.has(stored.sessionId)) continue;

      const session: Session = {
        sessionId: stored.sessionId,
        sourceName: stored.sourceName,
        sourceKind: stored.sourceKind,
        createdAt: stored.createdAt,
        indexStore,
        stats: stored.stats,
        ...(stored.summary != null ? { summary: stored.summary } : {})
      };
      this.slots.set(session.sessionId, { state: "committed", session });
      loaded += 1;
    }
    return loaded;
  }
}

function toStoredSession(session: Session): StoredSession {
  return {
    version: 1,
    sessionId: session.sessionId,
    sourceName: session.sourceName,
    sourceKind: session.sourceKind,
    createdAt: session.createdAt,
    ...(session.summary != null ? { summary: session.summary } : {}),
    embeddingDimension: session.indexStore.dimension,
    metric: session.indexStore.metric,
    stats: session.stats,
    chunks: session.indexStore.toStored()
  };
}
