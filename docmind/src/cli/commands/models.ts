import { hasModel, type ModelInfo } from "../../rag/generator.js";
import type { RagSession } from "../../rag/session.js";

const GIB = 1024 ** 3;

export function formatModels(models: ModelInfo[], current: string): string {
  if (models.length === 0) {
    return "No models installed. Install one with: ollama pull <model>\n";
  }
  return models
    .map((m) => {
      const marker = hasModel([m], current) ? " <- current" : "";
      return `  ${m.name} (${(m.sizeBytes / GIB).toFixed(1)} GB)${marker}\n`;
    })
    .join("");
}

export async function runModelsCommand(
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  write(formatModels(await session.listModels(), session.model));
}
