import { ChatGoogleGenerativeAI, GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";

export type GeminiSettings = Pick<Settings, "googleApiKey" | "chatModel" | "embeddingModel">;

export type GeminiProviders = {
  embeddings: GoogleGenerativeAIEmbeddings;
  chatModel: ChatGoogleGenerativeAI;
};

const MAX_RETRIES = 2;

/**
 * One chat model serves both answers and page summaries; temperature 0 keeps
 * answers tied to the retrieved context. Embedding vectors are normalized by
 * the index store, not here.
 */
export function createGeminiProviders(settings: GeminiSettings): GeminiProviders {
  return {
    embeddings: new GoogleGenerativeAIEmbeddings({
      apiKey: settings.googleApiKey,
      model: settings.embeddingModel,
      stripNewLines: true,
      maxRetries: MAX_RETRIES
    }),
    chatModel: new ChatGoogleGenerativeAI({
      apiKey: settings.googleApiKey,
      model: settings.chatModel,
      temperature: 0,
      maxRetries: MAX_RETRIES
    })
  };
}
