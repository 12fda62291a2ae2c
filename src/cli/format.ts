import { toErrorPayload } from "../errors.js";
import type { AnswerRecord, IngestionResult } from "../rag/types.js";
import type { IngestionStats } from "../retrieval/types.js";
import type { SessionSummary } from "../sessions/registry.js";

function formatStats(stats: IngestionStats): string[] {
  return [
    `chunks: ${stats.chunkCount} (size ${stats.chunkSize}, overlap ${stats.chunkOverlap})`,
    `characters: ${stats.totalChars} (avg ${stats.avgChunkSize} per chunk)`,
    `embeddings: ${stats.embeddingModel}, dim ${stats.embeddingDimension}, ${stats.distanceMetric}`
  ];
}

export function formatIngestion(result: IngestionResult): string {
  const lines = [`session: ${result.sessionId}`, ...formatStats(result.stats)];
  if (result.summary) {
    lines.push("", result.summary);
  }
  return lines.join("\n");
}

export function formatAnswer(record: AnswerRecord): string {
  const s = record.technicalStats;
  const sources = record.citations.map((c) => {
    const page = c.page != null ? ` p.${c.page}` : "";
    return `  [${c.chunkId}] ${c.source}${page}  similarity ${c.similarityScorePct}%`;
  });
  const threshold =
    s.similarityThresholdApplied == null ? "none" : String(s.similarityThresholdApplied);

  return [
    record.answerText.trim(),
    "",
    "Sources:",
    ...sources,
    "",
    `retrieved ${s.chunksRetrievedInitial}/${s.totalChunksInIndex}, ` +
      `after similarity filter ${s.chunksAfterSimilarityFilter} (threshold ${threshold}), ` +
      `used ${s.chunksUsedForAnswer}`,
    `similarity avg ${s.avgSimilarityScorePct}% max ${s.maxSimilarityScorePct}% min ${s.minSimilarityScorePct}%`
  ].join("\n");
}

export function formatSessionLine(session: SessionSummary): string {
  return `${session.sessionId}  ${session.sourceKind.padEnd(4)}  ${session.createdAt}  ${session.sourceName}`;
}

export function formatSessionSummary(session: SessionSummary): string {
  const lines = [
    `session: ${session.sessionId}`,
    `source: ${session.sourceName} (${session.sourceKind})`,
    `created: ${session.createdAt}`,
    ...formatStats(session.stats)
  ];
  if (session.summary) {
    lines.push("", session.summary);
  }
  return lines.join("\n");
}

/** The stderr line for a failed command. Only typed errors show their message. */
export function formatCliError(err: unknown): string {
  const payload = toErrorPayload(err);
  return `${payload.kind}: ${payload.message}`;
}
