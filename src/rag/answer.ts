import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import type { Settings } from "../config/settings.js";
import { GenerationError, InvalidArgumentError, NoRelevantChunksError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { filterBySimilarity, roundTo, scoreHits, toSimilarityPct, type ScoredHit } from "../retrieval/scoring.js";
import type { SessionRegistry } from "../sessions/registry.js";
import { PREVIEW_CHARS, buildContext, sourceLabel, type ContextBlock } from "./context.js";
import { buildAnswerPrompt } from "./prompts.js";
import type { RelevanceFilter } from "./relevance.js";
import { validateQuestion, validateThreshold } from "./sourceValidation.js";
import type { AnswerRecord, Citation, TechnicalStats } from "./types.js";

export type AnswerSettings = Pick<Settings, "chatModel" | "systemPrompt" | "initialK" | "similarityThreshold">;

export type AnswerDeps = {
  registry: SessionRegistry;
  chatModel: BaseChatModel;
  relevanceFilter: RelevanceFilter;
  settings: AnswerSettings;
  log?: Logger;
};

export type AnswerRequest = {
  sessionId: string;
  question: string;
  /** In [0, 1]. Absent falls back to the configured threshold; null keeps every retrieved chunk. */
  similarityThreshold?: number | null;
  initialK?: number;
  signal?: AbortSignal;
};

async function applyRelevanceFilter(
  hits: readonly ScoredHit[],
  question: string,
  filter: RelevanceFilter
): Promise<ScoredHit[]> {
  const verdicts = await Promise.all(hits.map((h) => filter.check(h.chunk.text, question)));
  return hits.filter((_, i) => verdicts[i]?.isRelevant === true);
}

function aggregate(pcts: readonly number[]): { avg: number; max: number; min: number } {
  if (pcts.length === 0) return { avg: 0, max: 0, min: 0 };
  const sum = pcts.reduce((a, b) => a + b, 0);
  return {
    avg: roundTo(sum / pcts.length, 1),
    max: Math.max(...pcts),
    min: Math.min(...pcts)
  };
}

function toCitation(hit: ScoredHit, chunkId: number): Citation {
  return {
    chunkId,
    source: sourceLabel(hit.chunk.sourceId),
    similarityScorePct: toSimilarityPct(hit.similarity),
    ...(hit.chunk.pageNumber != null ? { page: hit.chunk.pageNumber } : {}),
    contentPreview: hit.chunk.text.slice(0, PREVIEW_CHARS)
  };
}

/**
 * Answers a question from one session's index.
 *
 * similarity search → normalization → threshold filter → relevance filter →
 * context → generation. Everything before generation is local to the call, so
 * an abort before that point leaves nothing behind.
 */
export async function answerQuestion(request: AnswerRequest, deps: AnswerDeps): Promise<AnswerRecord> {
  const log = deps.log ?? silentLogger;
  const question = validateQuestion(request.question);
  const threshold = validateThreshold(
    request.similarityThreshold !== undefined ? request.similarityThreshold : deps.settings.similarityThreshold
  );
  const initialK = request.initialK ?? deps.settings.initialK;
  if (!Number.isInteger(initialK) || initialK <= 0) {
    throw new InvalidArgumentError(`initialK must be a positive integer (got ${initialK})`);
  }

  const session = deps.registry.get(request.sessionId);
  const { indexStore } = session;

  const hits = await indexStore.search(question, initialK);
  request.signal?.throwIfAborted();

  const scored = scoreHits(hits);
  const afterSimilarity = filterBySimilarity(scored, threshold);
  if (afterSimilarity.length === 0) {
    throw new NoRelevantChunksError(
      threshold == null
        ? "The document index returned no chunks"
        : `No chunk reached the similarity threshold ${threshold} (${hits.length} retrieved)`
    );
  }

  const used = await applyRelevanceFilter(afterSimilarity, question, deps.relevanceFilter);
  if (used.length === 0) {
    throw new NoRelevantChunksError("No retrieved chunk passed the relevance filter");
  }

  const citations = used.map((hit, i) => toCitation(hit, i + 1));
  const blocks: ContextBlock[] = used.map((hit, i) => ({
    chunkId: i + 1,
    source: sourceLabel(hit.chunk.sourceId),
    text: hit.chunk.text
  }));
  const prompt = buildAnswerPrompt({ context: buildContext(blocks), question });

  request.signal?.throwIfAborted();
  log.info(`[Answer] ${session.sessionId}: generating from ${used.length} chunk(s)`);

  let answerText: string;
  try {
    const result = await deps.chatModel.invoke(
      [new SystemMessage(deps.settings.systemPrompt), new HumanMessage(prompt)],
      request.signal ? { signal: request.signal } : undefined
    );
    answerText = String(result.content);
  } catch (err: unknown) {
    if (request.signal?.aborted) throw err;
    throw new GenerationError("Language model failed while generating the answer", { cause: err });
  }

  const stats = aggregate(citations.map((c) => c.similarityScorePct));
  const technicalStats: TechnicalStats = {
    totalChunksInIndex: indexStore.size(),
    chunksRetrievedInitial: hits.length,
    chunksAfterSimilarityFilter: afterSimilarity.length,
    chunksUsedForAnswer: used.length,
    avgSimilarityScorePct: stats.avg,
    maxSimilarityScorePct: stats.max,
    minSimilarityScorePct: stats.min,
    similarityThresholdApplied: threshold,
    relevanceFilter: deps.relevanceFilter.name,
    embeddingModel: session.stats.embeddingModel,
    embeddingDimension: indexStore.dimension,
    distanceMetric: indexStore.metric,
    llmModel: deps.settings.chatModel
  };

  return { answerText, citations, technicalStats };
}
