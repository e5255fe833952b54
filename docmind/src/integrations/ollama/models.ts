import { Ollama } from "ollama";

import type { Settings } from "../../config/settings.js";
import { errorMessage } from "../../errors.js";
import type { ModelCatalog, ModelInfo } from "../../rag/generator.js";

export class OllamaModelCatalog implements ModelCatalog {
  private readonly client: Ollama;
  private readonly host: string;

  constructor(settings: Settings) {
    this.host = settings.ollamaBaseUrl;
    this.client = new Ollama({ host: settings.ollamaBaseUrl });
  }

  async listModels(): Promise<ModelInfo[]> {
    try {
      const { models } = await this.client.list();
      return models.map((m) => ({ name: m.name, sizeBytes: m.size }));
    } catch (err: unknown) {
      throw new Error(`Cannot list models at ${this.host}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
