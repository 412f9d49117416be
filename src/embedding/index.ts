export type {
  EmbeddingProviderId,
  EmbeddingModel,
  EmbeddingProvider,
} from "../types/embedding.js";

export { OpenAIEmbeddingProvider } from "./providers/openai.js";
export type { OpenAIEmbeddingOptions } from "./providers/openai.js";
export { OllamaEmbeddingProvider } from "./providers/ollama.js";

import type {
  EmbeddingModel,
  EmbeddingProviderId,
  EmbeddingProvider,
} from "../types/embedding.js";
import {
  DEFAULT_OPENAI_MODEL,
  OPENAI_MODELS,
  OpenAIEmbeddingProvider,
} from "./providers/openai.js";
import {
  DEFAULT_OLLAMA_MODEL,
  OLLAMA_MODELS,
  OllamaEmbeddingProvider,
} from "./providers/ollama.js";

export const DEFAULT_MAX_TOKENS = 8192;

/** Rough characters-per-token ratio used for truncation. */
const CHARS_PER_TOKEN = 4;

export interface EmbeddingProviderOptions {
  provider: EmbeddingProviderId;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  dimensions?: number;
  /** Token budget per text; longer texts are cut before sending. */
  maxTokens?: number;
}

const KNOWN_MODELS: Record<EmbeddingProviderId, { fallback: string; models: EmbeddingModel[] }> = {
  openai: { fallback: DEFAULT_OPENAI_MODEL, models: OPENAI_MODELS },
  ollama: { fallback: DEFAULT_OLLAMA_MODEL, models: OLLAMA_MODELS },
};

/**
 * Vector size a provider produces for `model` (its default model when
 * omitted), or undefined when the model is not one memkit knows.
 */
export function knownEmbeddingDimension(
  provider: EmbeddingProviderId,
  model?: string,
): number | undefined {
  const known = KNOWN_MODELS[provider];
  const name = model ?? known.fallback;
  return known.models.find((m) => m.name === name)?.dimension;
}

export function truncateTexts(texts: string[], maxTokens: number): string[] {
  const maxChars = maxTokens * CHARS_PER_TOKEN;
  return texts.map((text) =>
    text.length > maxChars ? text.slice(0, maxChars) : text,
  );
}

function createBaseProvider(options: EmbeddingProviderOptions): EmbeddingProvider {
  switch (options.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider({
        model: options.model ?? DEFAULT_OPENAI_MODEL,
        apiKey: options.apiKey,
        baseUrl: options.baseUrl,
        dimensions: options.dimensions,
      });
    case "ollama":
      return new OllamaEmbeddingProvider({
        model: options.model,
        baseUrl: options.baseUrl,
      });
  }
}

export function createEmbeddingProvider(
  options: EmbeddingProviderOptions,
): EmbeddingProvider {
  const provider = createBaseProvider(options);
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    provider: provider.provider,
    model: provider.model,
    availableModels() {
      return provider.availableModels();
    },
    async embed(text) {
      const [vector] = await provider.embedBatch(truncateTexts([text], maxTokens));
      return vector;
    },
    async embedBatch(texts) {
      if (texts.length === 0) return [];
      return provider.embedBatch(truncateTexts(texts, maxTokens));
    },
  };
}
