import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { Settings } from "./config/settings.js";
import { createGeminiProviders } from "./integrations/gemini/providers.js";
import { PdfExtractor } from "./loaders/pdfExtractor.js";
import { TextFileExtractor } from "./loaders/textFileExtractor.js";
import { WebPageExtractor } from "./loaders/webPageExtractor.js";
import { silentLogger, type Logger } from "./logger.js";
import { answerQuestion, type AnswerRequest } from "./rag/answer.js";
import { ingestSource, type Extractors, type IngestSource } from "./rag/ingest.js";
import { createRelevanceFilter } from "./rag/relevance.js";
import type { AnswerRecord, IngestionResult } from "./rag/types.js";
import { SessionRegistry } from "./sessions/registry.js";

export type App = {
  registry: SessionRegistry;
  ingest(source: IngestSource): Promise<IngestionResult>;
  answer(request: AnswerRequest): Promise<AnswerRecord>;
};

export type AppOverrides = {
  embeddings?: EmbeddingsInterface;
  chatModel?: BaseChatModel;
  extractors?: Extractors;
  log?: Logger;
};

/**
 * Wires settings, providers and the session registry together. Previously
 * stored sessions are loaded from `settings.sessionDir` before returning.
 */
export async function createApp(settings: Settings, overrides: AppOverrides = {}): Promise<App> {
  const log = overrides.log ?? silentLogger;
  const gemini = createGeminiProviders(settings);
  const embeddings: EmbeddingsInterface = overrides.embeddings ?? gemini.embeddings;
  const chatModel: BaseChatModel = overrides.chatModel ?? gemini.chatModel;
  const extractors: Extractors = overrides.extractors ?? {
    pdf: new PdfExtractor(),
    url: new WebPageExtractor(),
    text: new TextFileExtractor()
  };
  const relevanceFilter = createRelevanceFilter(settings.relevanceFilter);

  const registry = new SessionRegistry({ sessionDir: settings.sessionDir, log });
  const restored = await registry.restore(embeddings);
  if (restored > 0) log.info(`[Sessions] Restored ${restored} session(s) from ${settings.sessionDir}`);

  return {
    registry,
    ingest: (source) =>
      ingestSource(source, { registry, embeddings, chatModel, extractors, settings, log }),
    answer: (request) =>
      answerQuestion(request, { registry, chatModel, relevanceFilter, settings, log })
  };
}
