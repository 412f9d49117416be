import { describe, it, expect } from "vitest";
import { loadMemoryConfig, parseIntOr } from "../../src/config/settings.js";
import { ConfigurationError } from "../../src/errors.js";

describe("loadMemoryConfig", () => {
  it("should default to the lexical backend", () => {
    expect(loadMemoryConfig({})).toEqual({
      backend: "lexical",
      snapshotFilename: "memories.json",
    });
  });

  it("should build a semantic OpenAI and Qdrant configuration", () => {
    const config = loadMemoryConfig({
      MEMKIT_MEMORY_BACKEND: "semantic",
      MEMKIT_SNAPSHOT_FILENAME: "notes.json",
      MEMKIT_SCORE_THRESHOLD: "0.35",
      MEMKIT_EMBEDDER_MODEL: "text-embedding-3-large",
      MEMKIT_EMBEDDER_DIMENSIONS: "256",
      OPENAI_API_KEY: "test-key",
      OPENAI_BASE_URL: "http://openai.test/v1",
      QDRANT_URL: "http://qdrant.test:6333",
      QDRANT_API_KEY: "test-qdrant-key",
      MEMKIT_QDRANT_COLLECTION: "notes",
      MEMKIT_VECTOR_DIMENSION: "256",
      MEMKIT_DISTANCE: "dot",
    });

    expect(config).toEqual({
      backend: "semantic",
      snapshotFilename: "notes.json",
      scoreThreshold: 0.35,
      embedder: {
        provider: "openai",
        model: "text-embedding-3-large",
        dimensions: 256,
        maxTokens: 8192,
        apiKey: "test-key",
        baseUrl: "http://openai.test/v1",
      },
      vectorStore: {
        provider: "qdrant",
        url: "http://qdrant.test:6333",
        apiKey: "test-qdrant-key",
        collectionName: "notes",
        vectorDimension: 256,
        distance: "dot",
      },
    });
  });

  it("should build an Ollama and in-memory configuration", () => {
    const config = loadMemoryConfig({
      MEMKIT_MEMORY_BACKEND: "semantic",
      MEMKIT_EMBEDDER_PROVIDER: "ollama",
      MEMKIT_EMBEDDER_MAX_TOKENS: "512",
      OLLAMA_BASE_URL: "http://ollama.test:11434",
      OPENAI_API_KEY: "test-key",
      MEMKIT_VECTOR_STORE: "memory",
    });

    expect(config).toEqual({
      backend: "semantic",
      snapshotFilename: "memories.json",
      embedder: {
        provider: "ollama",
        maxTokens: 512,
        baseUrl: "http://ollama.test:11434",
      },
      vectorStore: { provider: "memory", distance: "cosine" },
    });
  });

  it("should fall back to defaults for unparsable numbers", () => {
    const config = loadMemoryConfig({
      MEMKIT_MEMORY_BACKEND: "semantic",
      MEMKIT_SCORE_THRESHOLD: "high",
      MEMKIT_EMBEDDER_MAX_TOKENS: "lots",
      MEMKIT_VECTOR_DIMENSION: "-4",
    });
    expect(config).toMatchObject({
      embedder: { maxTokens: 8192 },
      vectorStore: { vectorDimension: 1536 },
    });
    expect("scoreThreshold" in config ? config.scoreThreshold : undefined).toBeUndefined();
  });

  it.each([
    ["the default Ollama model", { MEMKIT_EMBEDDER_PROVIDER: "ollama" }, 768],
    ["a named OpenAI model", { MEMKIT_EMBEDDER_MODEL: "text-embedding-3-large" }, 3072],
    ["requested embedding dimensions", { MEMKIT_EMBEDDER_DIMENSIONS: "256" }, 256],
    ["an unknown model", { MEMKIT_EMBEDDER_MODEL: "custom-embed" }, 1536],
  ])("should size the Qdrant collection for %s", (_label, env, dimension) => {
    const config = loadMemoryConfig({ MEMKIT_MEMORY_BACKEND: "semantic", ...env });
    expect(config).toMatchObject({
      vectorStore: { provider: "qdrant", vectorDimension: dimension },
    });
  });

  it("should prefer an explicit MEMKIT_VECTOR_DIMENSION", () => {
    const config = loadMemoryConfig({
      MEMKIT_MEMORY_BACKEND: "semantic",
      MEMKIT_EMBEDDER_PROVIDER: "ollama",
      MEMKIT_VECTOR_DIMENSION: "1024",
    });
    expect(config).toMatchObject({ vectorStore: { vectorDimension: 1024 } });
  });

  it.each([
    ["MEMKIT_MEMORY_BACKEND", "graph"],
    ["MEMKIT_EMBEDDER_PROVIDER", "acme"],
    ["MEMKIT_VECTOR_STORE", "pinecone"],
    ["MEMKIT_DISTANCE", "manhattan"],
  ])("should reject an invalid %s", (name, value) => {
    const env = { MEMKIT_MEMORY_BACKEND: "semantic", [name]: value };
    expect(() => loadMemoryConfig(env)).toThrow(ConfigurationError);
  });

  it("should name the allowed values", () => {
    expect(() => loadMemoryConfig({ MEMKIT_MEMORY_BACKEND: "graph" })).toThrow(
      'Invalid MEMKIT_MEMORY_BACKEND: graph. Must be one of "lexical", "semantic".',
    );
  });
});

describe("parseIntOr", () => {
  it("should parse positive integers and fall back otherwise", () => {
    expect(parseIntOr("42", 1)).toBe(42);
    expect(parseIntOr(undefined, 1)).toBe(1);
    expect(parseIntOr("abc", 1)).toBe(1);
    expect(parseIntOr("0", 1)).toBe(1);
  });
});
