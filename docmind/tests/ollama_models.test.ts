import { Ollama } from "ollama";
import { afterEach, describe, expect, it, vi } from "vitest";

import { formatModels } from "../src/cli/commands/models.js";
import { loadSettings } from "../src/config/settings.js";
import { OllamaModelCatalog } from "../src/integrations/ollama/models.js";

describe("OllamaModelCatalog", () => {
  const settings = loadSettings({});

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists installed models with their size", async () => {
    const list = vi.spyOn(Ollama.prototype, "list").mockResolvedValue({
      models: [
        {
          name: "llama3.1:8b",
          model: "llama3.1:8b",
          modified_at: new Date(0),
          size: 4_920_753_328,
          digest: "d1",
          details: {
            parent_model: "",
            format: "gguf",
            family: "llama",
            families: ["llama"],
            parameter_size: "8.0B",
            quantization_level: "Q4_K_M"
          },
          expires_at: new Date(0),
          size_vram: 0
        }
      ]
    });

    await expect(new OllamaModelCatalog(settings).listModels()).resolves.toEqual([
      { name: "llama3.1:8b", sizeBytes: 4_920_753_328 }
    ]);
    expect(list).toHaveBeenCalledTimes(1);
  });

  it("names the host when listing fails", async () => {
    vi.spyOn(Ollama.prototype, "list").mockRejectedValue(new TypeError("fetch failed"));

    await expect(new OllamaModelCatalog(settings).listModels()).rejects.toThrow(
      "Cannot list models at http://127.0.0.1:11434: fetch failed"
    );
  });
});

describe("formatModels", () => {
  it("marks the current model, matching an implicit :latest tag", () => {
    const models = [
      { name: "all-minilm:latest", sizeBytes: 45_960_996 },
      { name: "llama3.1:8b", sizeBytes: 4_920_753_328 }
    ];

    expect(formatModels(models, "all-minilm")).toBe(
      "  all-minilm:latest (0.0 GB) <- current\n  llama3.1:8b (4.6 GB)\n"
    );
  });

  it("explains how to install a model when none is present", () => {
    expect(formatModels([], "llama3.1:8b")).toBe(
      "No models installed. Install one with: ollama pull <model>\n"
    );
  });
});
