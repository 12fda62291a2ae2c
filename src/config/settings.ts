import { InvalidArgumentError } from "../errors.js";
import type { DistanceMetric } from "../retrieval/types.js";

const DEFAULT_SYSTEM_PROMPT = `You are a careful document assistant.
- Answer in the language of the question.
- Use only the information in the supplied context. If the context does not contain the answer, say so plainly.
- Keep answers short and factual. No speculation, no outside knowledge.
- Quote numbers, names and dates exactly as they appear in the context.`;

export type RelevanceFilterKind = "none";

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  sessionDir: string;
  systemPrompt: string;
  chunkSize: number;
  chunkOverlap: number;
  initialK: number;
  similarityThreshold: number | null;
  distanceMetric: DistanceMetric;
  summaryCharBudget: number;
  relevanceFilter: RelevanceFilterKind;
  verbose: boolean;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readThreshold(env: Env): number | null {
  const raw = env.ASKDOC_SIMILARITY_THRESHOLD;
  if (raw == null || raw.trim() === "") return null;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(
      `ASKDOC_SIMILARITY_THRESHOLD must be a number in [0, 1] (got "${raw}")`
    );
  }
  return value;
}

function readMetric(env: Env): DistanceMetric {
  const raw = (env.ASKDOC_DISTANCE_METRIC ?? "l2").trim().toLowerCase();
  if (raw !== "l2" && raw !== "cosine") {
    throw new InvalidArgumentError(`ASKDOC_DISTANCE_METRIC must be "l2" or "cosine" (got "${raw}")`);
  }
  return raw;
}

function readRelevanceFilter(env: Env): RelevanceFilterKind {
  const raw = (env.ASKDOC_RELEVANCE_FILTER ?? "none").trim().toLowerCase();
  if (raw !== "none") {
    throw new InvalidArgumentError(`Unsupported ASKDOC_RELEVANCE_FILTER: "${raw}"`);
  }
  return raw;
}

function readFlag(raw: string | undefined): boolean {
  if (raw == null) return false;
  return !(raw === "" || raw === "0" || raw.toLowerCase() === "false");
}

export function loadSettings(env: Env = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new InvalidArgumentError("GOOGLE_API_KEY is required");
  }

  const chunkSize = readInt(env, "ASKDOC_CHUNK_SIZE", 800, 1);
  const chunkOverlap = readInt(env, "ASKDOC_CHUNK_OVERLAP", 200, 0);
  if (chunkOverlap >= chunkSize) {
    throw new InvalidArgumentError(
      `ASKDOC_CHUNK_OVERLAP (${chunkOverlap}) must be smaller than ASKDOC_CHUNK_SIZE (${chunkSize})`
    );
  }

  return {
    googleApiKey,
    chatModel: env.ASKDOC_GEMINI_MODEL ?? "gemini-2.5-flash",
    embeddingModel: env.ASKDOC_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    sessionDir: env.ASKDOC_SESSION_DIR ?? ".askdoc/sessions",
    systemPrompt: env.ASKDOC_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    chunkSize,
    chunkOverlap,
    initialK: readInt(env, "ASKDOC_INITIAL_K", 10, 1),
    similarityThreshold: readThreshold(env),
    distanceMetric: readMetric(env),
    summaryCharBudget: readInt(env, "ASKDOC_SUMMARY_CHAR_BUDGET", 8000, 1),
    relevanceFilter: readRelevanceFilter(env),
    verbose: readFlag(env.ASKDOC_VERBOSE)
  };
}
