/**
 * Builds a memory configuration from environment variables.
 *
 * Unparsable numbers fall back to their defaults; unknown enumeration values
 * throw so a misspelt backend or provider is caught at startup.
 */

import { DEFAULT_MAX_TOKENS, knownEmbeddingDimension } from "../embedding/index.js";
import { ConfigurationError } from "../errors.js";
import type { EmbedderConfig, MemoryConfig, VectorStoreConfig } from "../memory/factory.js";
import { DEFAULT_SNAPSHOT_FILENAME } from "../memory/snapshot.js";
import {
  DEFAULT_COLLECTION_NAME,
  DEFAULT_VECTOR_DIMENSION,
} from "../vector-store/qdrant.js";

export type Env = Record<string, string | undefined>;

function parseEnum<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value === "") return fallback;
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw new ConfigurationError(
      `Invalid ${name}: ${value}. Must be one of ${allowed.map((a) => `"${a}"`).join(", ")}.`,
      { issues: [`${name}: Invalid enum value`] },
    );
  }
  return match;
}

export function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function loadEmbedderConfig(env: Env): EmbedderConfig {
  const provider = parseEnum(
    "MEMKIT_EMBEDDER_PROVIDER",
    env.MEMKIT_EMBEDDER_PROVIDER,
    ["openai", "ollama"],
    "openai",
  );
  const config: EmbedderConfig = {
    provider,
    maxTokens: parseIntOr(env.MEMKIT_EMBEDDER_MAX_TOKENS, DEFAULT_MAX_TOKENS),
  };
  if (env.MEMKIT_EMBEDDER_MODEL) config.model = env.MEMKIT_EMBEDDER_MODEL;

  const dimensions = parseOptionalInt(env.MEMKIT_EMBEDDER_DIMENSIONS);
  if (dimensions !== undefined) config.dimensions = dimensions;

  if (provider === "openai") {
    if (env.OPENAI_API_KEY) config.apiKey = env.OPENAI_API_KEY;
    if (env.OPENAI_BASE_URL) config.baseUrl = env.OPENAI_BASE_URL;
  } else if (env.OLLAMA_BASE_URL) {
    config.baseUrl = env.OLLAMA_BASE_URL;
  }
  return config;
}

function loadVectorStoreConfig(env: Env, embedder: EmbedderConfig): VectorStoreConfig {
  const provider = parseEnum(
    "MEMKIT_VECTOR_STORE",
    env.MEMKIT_VECTOR_STORE,
    ["qdrant", "memory"],
    "qdrant",
  );
  const distance = parseEnum(
    "MEMKIT_DISTANCE",
    env.MEMKIT_DISTANCE,
    ["cosine", "dot", "euclid"],
    "cosine",
  );
  if (provider === "memory") {
    return { provider, distance };
  }
  return {
    provider,
    url: env.QDRANT_URL ?? "http://localhost:6333",
    apiKey: env.QDRANT_API_KEY || undefined,
    collectionName: env.MEMKIT_QDRANT_COLLECTION || DEFAULT_COLLECTION_NAME,
    // Unset: the size the configured embedder produces.
    vectorDimension:
      parseOptionalInt(env.MEMKIT_VECTOR_DIMENSION) ??
      embedder.dimensions ??
      knownEmbeddingDimension(embedder.provider, embedder.model) ??
      DEFAULT_VECTOR_DIMENSION,
    distance,
  };
}

export function loadMemoryConfig(env: Env = process.env): MemoryConfig {
  const backend = parseEnum(
    "MEMKIT_MEMORY_BACKEND",
    env.MEMKIT_MEMORY_BACKEND,
    ["lexical", "semantic"],
    "lexical",
  );
  const snapshotFilename = env.MEMKIT_SNAPSHOT_FILENAME || DEFAULT_SNAPSHOT_FILENAME;

  if (backend === "lexical") {
    return { backend, snapshotFilename };
  }

  const embedder = loadEmbedderConfig(env);
  return {
    backend,
    snapshotFilename,
    scoreThreshold: parseOptionalFloat(env.MEMKIT_SCORE_THRESHOLD),
    embedder,
    vectorStore: loadVectorStoreConfig(env, embedder),
  };
}
