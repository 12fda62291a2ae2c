import { z } from "zod";

export type DistanceMetric = "l2" | "cosine";

export type Chunk = Readonly<{
  text: string;
  sourceId: string;
  positionIndex: number;
  pageNumber: number | null;
}>;

export type IndexEntry = Readonly<{
  chunk: Chunk;
  embedding: readonly number[];
}>;

export type RetrievalHit = {
  chunk: Chunk;
  distance: number;
};

export type SourceKind = "pdf" | "url" | "text";

export type IngestionStats = {
  chunkCount: number;
  totalChars: number;
  avgChunkSize: number;
  chunkSize: number;
  chunkOverlap: number;
  embeddingModel: string;
  embeddingDimension: number;
  distanceMetric: DistanceMetric;
  sourceKind: SourceKind;
};

const storedChunkSchema = z.object({
  text: z.string(),
  sourceId: z.string(),
  positionIndex: z.number().int().nonnegative(),
  pageNumber: z.number().int().nullable(),
  embedding: z.array(z.number())
});

const metricSchema = z.enum(["l2", "cosine"]);
const sourceKindSchema = z.enum(["pdf", "url", "text"]);

export const storedSessionSchema = z.object({
  version: z.literal(1),
  sessionId: z.string().uuid(),
  sourceName: z.string(),
  sourceKind: sourceKindSchema,
  createdAt: z.string(),
  summary: z.string().optional(),
  embeddingDimension: z.number().int().nonnegative(),
  metric: metricSchema,
  stats: z.object({
    chunkCount: z.number().int().nonnegative(),
    totalChars: z.number().int().nonnegative(),
    avgChunkSize: z.number().nonnegative(),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    embeddingModel: z.string(),
    embeddingDimension: z.number().int().nonnegative(),
    distanceMetric: metricSchema,
    sourceKind: sourceKindSchema
  }),
  chunks: z.array(storedChunkSchema)
});

export type StoredChunk = z.infer<typeof storedChunkSchema>;
export type StoredSession = z.infer<typeof storedSessionSchema>;
