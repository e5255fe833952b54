import { OllamaEmbeddings } from "@langchain/ollama";

import type { Settings } from "../../config/settings.js";

export function createEmbeddings(settings: Settings): OllamaEmbeddings {
  return new OllamaEmbeddings({
    baseUrl: settings.ollamaBaseUrl,
    model: settings.embeddingModel
  });
}
