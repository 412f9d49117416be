import type {
  EmbeddingModel,
  EmbeddingProvider,
} from "../../types/embedding.js";
import { EmbeddingApiError, toError } from "../../errors.js";

const DEFAULT_OLLAMA_URL = "http://localhost:11434";

export const DEFAULT_OLLAMA_MODEL = "nomic-embed-text:latest";

export const OLLAMA_MODELS: EmbeddingModel[] = [
  { name: "nomic-embed-text:latest", dimension: 768, provider: "ollama" },
  { name: "mxbai-embed-large:latest", dimension: 1024, provider: "ollama" },
  { name: "all-minilm:latest", dimension: 384, provider: "ollama" },
];

interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

function isEmbedResponse(value: unknown): value is OllamaEmbedResponse {
  if (typeof value !== "object" || value === null) return false;
  if (!("embeddings" in value) || !Array.isArray(value.embeddings)) return false;
  return value.embeddings.every(
    (row: unknown) =>
      Array.isArray(row) && row.every((n: unknown) => typeof n === "number"),
  );
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly provider = "ollama" as const;
  readonly model: string;
  private readonly baseUrl: string;

  constructor(options: { model?: string; baseUrl?: string }) {
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    this.baseUrl = (
      options.baseUrl ??
      process.env.OLLAMA_BASE_URL ??
      DEFAULT_OLLAMA_URL
    ).replace(/\/+$/, "");
  }

  async embed(text: string): Promise<number[]> {
    const result = await this.embedBatch([text]);
    return result[0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, input: texts }),
      });
    } catch (error) {
      throw new EmbeddingApiError(
        `Ollama embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        { provider: this.provider, cause: toError(error) },
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new EmbeddingApiError(
        `Ollama embedding failed (${response.status}): ${body}`,
        { provider: this.provider, statusCode: response.status },
      );
    }

    const json: unknown = await response.json();
    if (!isEmbedResponse(json) || json.embeddings.length !== texts.length) {
      throw new EmbeddingApiError(
        "Ollama embedding response did not contain one vector per input",
        { provider: this.provider, statusCode: response.status },
      );
    }
    return json.embeddings;
  }

  availableModels(): EmbeddingModel[] {
    return OLLAMA_MODELS;
  }
}
