import { HumanMessage } from "@langchain/core/messages";
import { ChatOllama } from "@langchain/ollama";

import type { Settings } from "../../config/settings.js";
import { InferenceError, ModelUnavailableError, errorMessage } from "../../errors.js";
import type { Generator } from "../../rag/generator.js";

export function createChatModel(settings: Settings, model: string): ChatOllama {
  return new ChatOllama({
    baseUrl: settings.ollamaBaseUrl,
    model,
    temperature: settings.temperature
  });
}

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return typeof value === "object" && value !== null && key in value;
}

/** Unknown model (HTTP 404) or no server listening. */
export function isModelUnavailable(err: unknown): boolean {
  if (hasProperty(err, "status_code") && err.status_code === 404) return true;
  const cause = hasProperty(err, "cause") ? err.cause : undefined;
  if (hasProperty(cause, "code") && cause.code === "ECONNREFUSED") return true;
  return /not found, try pulling it first|ECONNREFUSED|fetch failed/i.test(errorMessage(err));
}

export class OllamaGenerator implements Generator {
  private readonly settings: Settings;
  private readonly models = new Map<string, ChatOllama>();

  constructor(settings: Settings) {
    this.settings = settings;
  }

  async generate(prompt: string, model: string): Promise<string> {
    let llm = this.models.get(model);
    if (!llm) {
      llm = createChatModel(this.settings, model);
      this.models.set(model, llm);
    }

    try {
      const result = await llm.invoke([new HumanMessage(prompt)]);
      return result.text;
    } catch (err: unknown) {
      if (isModelUnavailable(err)) {
        throw new ModelUnavailableError(
          model,
          `Model "${model}" is not available at ${this.settings.ollamaBaseUrl}: ${errorMessage(err)}\nPull it with: ollama pull ${model}`,
          { cause: err }
        );
      }
      throw new InferenceError(model, `Generation with "${model}" failed: ${errorMessage(err)}`, {
        cause: err
      });
    }
  }
}
