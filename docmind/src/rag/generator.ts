/**
 * Text generator behind the assembled prompt. Implementations reject with
 * `ModelUnavailableError` or `InferenceError`; answers are not assumed to be
 * deterministic.
 */
export interface Generator {
  generate(prompt: string, model: string): Promise<string>;
}

export type ModelInfo = {
  name: string;
  sizeBytes: number;
};

/** Models the generator backend has installed. */
export interface ModelCatalog {
  listModels(): Promise<ModelInfo[]>;
}

/** `llama3.1` matches an installed `llama3.1:latest`. */
export function hasModel(models: ModelInfo[], model: string): boolean {
  return models.some((m) => m.name === model || m.name === `${model}:latest`);
}
