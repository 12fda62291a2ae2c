import type { DistanceMetric, IngestionStats } from "../retrieval/types.js";

export type Citation = {
  /** 1-based position among the chunks used for the answer. */
  chunkId: number;
  source: string;
  /** Embedding-space closeness to the question, 0–100. Not a judgment that the chunk answers it. */
  similarityScorePct: number;
  page?: number;
  contentPreview: string;
};

export type TechnicalStats = {
  totalChunksInIndex: number;
  chunksRetrievedInitial: number;
  chunksAfterSimilarityFilter: number;
  chunksUsedForAnswer: number;
  avgSimilarityScorePct: number;
  maxSimilarityScorePct: number;
  minSimilarityScorePct: number;
  similarityThresholdApplied: number | null;
  relevanceFilter: string;
  embeddingModel: string;
  embeddingDimension: number;
  distanceMetric: DistanceMetric;
  llmModel: string;
};

export type AnswerRecord = {
  answerText: string;
  citations: Citation[];
  technicalStats: TechnicalStats;
};

export type IngestionResult = {
  sessionId: string;
  stats: IngestionStats;
  summary?: string;
};
