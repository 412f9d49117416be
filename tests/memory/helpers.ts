import { vi } from "vitest";
import type { Logger } from "../../src/logging/logger.js";
import type { EmbeddingProvider } from "../../src/types/embedding.js";

/** Words the fake embedder counts; the last vector slot is a constant bias. */
export const VOCABULARY = ["python", "javascript", "coffee", "tea", "dog", "cat"];

export function embedText(text: string): number[] {
  const tokens = text.toLowerCase().split(/[^a-z]+/);
  const vector = VOCABULARY.map(
    (word) => tokens.filter((token) => token === word).length,
  );
  vector.push(0.1);
  return vector;
}

export function createFakeEmbedder() {
  const embedBatch = vi.fn(async (texts: string[]) => texts.map(embedText));
  const embedder: EmbeddingProvider = {
    provider: "ollama",
    model: "fake-embed",
    embed: async (text) => embedText(text),
    embedBatch,
    availableModels: () => [],
  };
  return { embedder, embedBatch };
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export const ID_A = "8f14e45f-ceea-4e67-9c9b-5e1d0a1b2c3d";
export const ID_B = "c9f0f895-fb98-4b91-8f7e-2a6b1d3c4e5f";
export const ID_C = "45c48cce-2e2d-4fbd-8a1b-7c6d5e4f3a2b";
