import OpenAI from "openai";
import type {
  EmbeddingModel,
  EmbeddingProvider,
} from "../../types/embedding.js";
import {
  ConfigurationError,
  EmbeddingApiError,
  statusCodeOf,
  toError,
} from "../../errors.js";

export const DEFAULT_OPENAI_MODEL = "text-embedding-3-small";

export const OPENAI_MODELS: EmbeddingModel[] = [
  { name: "text-embedding-3-small", dimension: 1536, provider: "openai" },
  { name: "text-embedding-3-large", dimension: 3072, provider: "openai" },
  { name: "text-embedding-ada-002", dimension: 1536, provider: "openai" },
];

export interface OpenAIEmbeddingOptions {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  /** Output size for models that accept a `dimensions` parameter. */
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly dimensions?: number;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        "OpenAI API key is required (pass apiKey or set OPENAI_API_KEY)",
      );
    }
    this.client = new OpenAI({ apiKey, baseURL: options.baseUrl });
  }

  async embed(text: string): Promise<number[]> {
    const result = await this.embedBatch([text]);
    return result[0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      });
      return response.data
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (error) {
      throw new EmbeddingApiError(
        `OpenAI embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        {
          provider: this.provider,
          statusCode: statusCodeOf(error),
          cause: toError(error),
        },
      );
    }
  }

  availableModels(): EmbeddingModel[] {
    return OPENAI_MODELS;
  }
}
