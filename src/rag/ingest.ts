import path from "node:path";

import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage } from "@langchain/core/messages";

import { splitPages } from "../chunking/chunker.js";
import type { Settings } from "../config/settings.js";
import { InvalidArgumentError, SummarizationError, UnreadableSourceError, isRagError } from "../errors.js";
import type { ExtractedPage, PdfInput, TextExtractor, TextFileInput, UrlInput } from "../loaders/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { InMemoryIndexStore } from "../retrieval/indexStore.js";
import { roundTo } from "../retrieval/scoring.js";
import type { Chunk, IngestionStats, SourceKind } from "../retrieval/types.js";
import type { SessionRegistry } from "../sessions/registry.js";
import { buildSummaryPrompt } from "./prompts.js";
import { validatePdfUpload, validateUrl } from "./sourceValidation.js";
import type { IngestionResult } from "./types.js";

export type IngestSource =
  | ({ kind: "pdf" } & PdfInput)
  | ({ kind: "url" } & UrlInput)
  | ({ kind: "text" } & TextFileInput);

export type Extractors = {
  pdf: TextExtractor<PdfInput>;
  url: TextExtractor<UrlInput>;
  text: TextExtractor<TextFileInput>;
};

export type IngestionSettings = Pick<
  Settings,
  "embeddingModel" | "chunkSize" | "chunkOverlap" | "distanceMetric" | "summaryCharBudget"
>;

export type IngestionDeps = {
  registry: SessionRegistry;
  embeddings: EmbeddingsInterface;
  chatModel: BaseChatModel;
  extractors: Extractors;
  settings: IngestionSettings;
  log?: Logger;
};

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown"]);

function planExtraction(
  source: IngestSource,
  extractors: Extractors
): { sourceName: string; run: () => Promise<ExtractedPage[]> } {
  switch (source.kind) {
    case "pdf": {
      const sourceName = validatePdfUpload(source);
      const { data } = source;
      return { sourceName, run: () => extractors.pdf.extract({ fileName: sourceName, data }) };
    }
    case "url": {
      const sourceName = validateUrl(source.url);
      return { sourceName, run: () => extractors.url.extract({ url: sourceName }) };
    }
    case "text": {
      const ext = path.extname(source.filePath).toLowerCase();
      if (!TEXT_EXTENSIONS.has(ext)) {
        throw new InvalidArgumentError(`Unsupported text file type: ${ext || "(none)"}`);
      }
      const { filePath } = source;
      return {
        sourceName: path.basename(filePath),
        run: () => extractors.text.extract({ filePath })
      };
    }
  }
}

async function extractPages(
  source: IngestSource,
  extractors: Extractors
): Promise<{ sourceName: string; pages: ExtractedPage[] }> {
  const { sourceName, run } = planExtraction(source, extractors);

  let pages: ExtractedPage[];
  try {
    pages = await run();
  } catch (err: unknown) {
    if (isRagError(err)) throw err;
    throw new UnreadableSourceError(`Could not read source: ${sourceName}`, { cause: err });
  }

  if (!pages.some((p) => p.text.trim().length > 0)) {
    throw new UnreadableSourceError(`No text extracted from ${sourceName}`);
  }
  return { sourceName, pages };
}

async function summarizeWebPage(params: {
  chatModel: BaseChatModel;
  url: string;
  pages: readonly ExtractedPage[];
  charBudget: number;
}): Promise<string> {
  const fullText = params.pages.map((p) => p.text).join("\n\n");
  const prompt = buildSummaryPrompt({
    content: fullText.slice(0, params.charBudget),
    url: params.url
  });

  let summary: string;
  try {
    const result = await params.chatModel.invoke([new HumanMessage(prompt)]);
    summary = String(result.content).trim();
  } catch (err: unknown) {
    throw new SummarizationError("Language model failed while summarizing the page", { cause: err });
  }

  if (!summary) {
    throw new SummarizationError("Language model returned an empty summary");
  }
  if (!summary.includes(params.url)) {
    summary = `${summary}\n\n[Source: ${params.url}]`;
  }
  return summary;
}

export function computeIngestionStats(params: {
  chunks: readonly Chunk[];
  embeddingDimension: number;
  sourceKind: SourceKind;
  settings: IngestionSettings;
}): IngestionStats {
  const totalChars = params.chunks.reduce((sum, c) => sum + c.text.length, 0);
  const chunkCount = params.chunks.length;
  return {
    chunkCount,
    totalChars,
    avgChunkSize: chunkCount > 0 ? roundTo(totalChars / chunkCount, 2) : 0,
    chunkSize: params.settings.chunkSize,
    chunkOverlap: params.settings.chunkOverlap,
    embeddingModel: params.settings.embeddingModel,
    embeddingDimension: params.embeddingDimension,
    distanceMetric: params.settings.distanceMetric,
    sourceKind: params.sourceKind
  };
}

/**
 * Extracts, chunks and indexes one source into a new session.
 *
 * The session stays pending until everything (including the URL summary)
 * succeeded; on any failure it is deleted and the typed error is rethrown.
 */
export async function ingestSource(
  source: IngestSource,
  deps: IngestionDeps
): Promise<IngestionResult> {
  const log = deps.log ?? silentLogger;
  const { settings } = deps;

  const { sourceName, pages } = await extractPages(source, deps.extractors);
  log.info(`[Ingest] Extracted ${pages.length} page(s) from ${sourceName}`);

  const chunks = await splitPages(pages, {
    sourceId: sourceName,
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap
  });
  if (chunks.length === 0) {
    throw new UnreadableSourceError(`No text extracted from ${sourceName}`);
  }

  const indexStore = new InMemoryIndexStore(deps.embeddings, settings.distanceMetric);
  const pending = deps.registry.create({ sourceName, sourceKind: source.kind, indexStore });

  try {
    log.info(`[Ingest] Embedding ${chunks.length} chunks`);
    await indexStore.add(chunks);

    const summary =
      source.kind === "url"
        ? await summarizeWebPage({
            chatModel: deps.chatModel,
            url: sourceName,
            pages,
            charBudget: settings.summaryCharBudget
          })
        : undefined;

    const stats = computeIngestionStats({
      chunks,
      embeddingDimension: indexStore.dimension,
      sourceKind: source.kind,
      settings
    });
    const session = await deps.registry.commit(pending.sessionId, {
      stats,
      ...(summary != null ? { summary } : {})
    });

    return {
      sessionId: session.sessionId,
      stats,
      ...(summary != null ? { summary } : {})
    };
  } catch (err: unknown) {
    try {
      await deps.registry.delete(pending.sessionId);
      log.warn(`[Ingest] Aborted ${sourceName}; session discarded`);
    } catch (cleanupErr: unknown) {
      const message = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      log.warn(`[Ingest] Aborted ${sourceName}; could not discard session ${pending.sessionId}: ${message}`);
    }
    throw err;
  }
}
