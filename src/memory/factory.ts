import { z } from "zod";

import { createEmbeddingProvider, DEFAULT_MAX_TOKENS } from "../embedding/index.js";
import { ConfigurationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { DataStorage } from "../storage/storage.js";
import type { EmbeddingProvider } from "../types/embedding.js";
import type { VectorStore } from "../types/vector-store.js";
import { InMemoryVectorStore } from "../vector-store/memory.js";
import {
  DEFAULT_COLLECTION_NAME,
  DEFAULT_VECTOR_DIMENSION,
  QdrantVectorStore,
} from "../vector-store/qdrant.js";
import type { MemoryBackend } from "./backend.js";
import { FileSystemStorage } from "../storage/fs.js";
import { formatIssues } from "./item.js";
import { LexicalMemory } from "./lexical.js";
import { SemanticMemory } from "./semantic.js";
import { configFile, readConfigFile } from "./snapshot.js";
import { MemoryStore } from "./store.js";

const DistanceSchema = z.enum(["cosine", "dot", "euclid"]);

export const EmbedderConfigSchema = z
  .object({
    provider: z.enum(["openai", "ollama"]),
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    dimensions: z.number().int().positive().optional(),
    maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  })
  .strict();

export const VectorStoreConfigSchema = z.discriminatedUnion("provider", [
  z
    .object({
      provider: z.literal("qdrant"),
      url: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      collectionName: z.string().min(1).default(DEFAULT_COLLECTION_NAME),
      /** Defaults to the embedder's output size. */
      vectorDimension: z.number().int().positive().optional(),
      distance: DistanceSchema.default("cosine"),
    })
    .strict(),
  z
    .object({
      provider: z.literal("memory"),
      distance: DistanceSchema.default("cosine"),
    })
    .strict(),
]);

export const MemoryConfigSchema = z.discriminatedUnion("backend", [
  z
    .object({
      backend: z.literal("lexical"),
      snapshotFilename: z.string().min(1).optional(),
    })
    .strict(),
  z
    .object({
      backend: z.literal("semantic"),
      snapshotFilename: z.string().min(1).optional(),
      scoreThreshold: z.number().finite().optional(),
      scrollPageSize: z.number().int().positive().optional(),
      embedder: EmbedderConfigSchema.optional(),
      vectorStore: VectorStoreConfigSchema.optional(),
    })
    .strict(),
]);

export type EmbedderConfig = z.input<typeof EmbedderConfigSchema>;
export type VectorStoreConfig = z.input<typeof VectorStoreConfigSchema>;
export type MemoryConfig = z.input<typeof MemoryConfigSchema>;
export type ResolvedMemoryConfig = z.output<typeof MemoryConfigSchema>;

/** Ready-made collaborators that take precedence over the config blocks. */
export interface MemoryDependencies {
  embedder?: EmbeddingProvider;
  vectorStore?: VectorStore;
  storage?: DataStorage;
  logger?: Logger;
}

export function parseMemoryConfig(config: unknown): ResolvedMemoryConfig {
  const parsed = MemoryConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid memory configuration", {
      issues: formatIssues(parsed.error),
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Output size of the embedder, when it is configured or a known model. */
function embedderDimension(
  embedder: EmbeddingProvider,
  configured?: number,
): number | undefined {
  if (configured !== undefined) return configured;
  return embedder.availableModels().find((m) => m.name === embedder.model)?.dimension;
}

function checkDimension(
  vectorDimension: number,
  embedder: EmbeddingProvider,
  dimension: number | undefined,
): void {
  if (dimension === undefined || dimension === vectorDimension) return;
  throw new ConfigurationError(
    `Vector dimension ${vectorDimension} does not match embedder ${embedder.model} (${dimension})`,
    { issues: ["vectorStore.vectorDimension: Does not match the embedder output size"] },
  );
}

function createVectorStore(
  config: z.output<typeof VectorStoreConfigSchema>,
  dimension: number | undefined,
): VectorStore {
  switch (config.provider) {
    case "qdrant":
      return new QdrantVectorStore({
        url: config.url,
        apiKey: config.apiKey,
        collectionName: config.collectionName,
        vectorDimension: config.vectorDimension ?? dimension ?? DEFAULT_VECTOR_DIMENSION,
        distance: config.distance,
      });
    case "memory":
      return new InMemoryVectorStore({ distance: config.distance });
  }
}

function buildBackend(
  parsed: ResolvedMemoryConfig,
  deps: MemoryDependencies,
): MemoryBackend {
  const common = {
    logger: deps.logger,
    storage: deps.storage,
    snapshotFilename: parsed.snapshotFilename,
  };

  if (parsed.backend === "lexical") {
    return new LexicalMemory(common);
  }

  const embedder =
    deps.embedder ?? (parsed.embedder && createEmbeddingProvider(parsed.embedder));
  if (!embedder) {
    throw new ConfigurationError("Semantic memory requires an embedder", {
      issues: ["embedder: Required"],
    });
  }
  const dimension = embedderDimension(
    embedder,
    deps.embedder ? undefined : parsed.embedder?.dimensions,
  );

  const vectorStore =
    deps.vectorStore ??
    (parsed.vectorStore && createVectorStore(parsed.vectorStore, dimension));
  if (!vectorStore) {
    throw new ConfigurationError("Semantic memory requires a vector store", {
      issues: ["vectorStore: Required"],
    });
  }
  if (vectorStore instanceof QdrantVectorStore) {
    checkDimension(vectorStore.vectorDimension, embedder, dimension);
  }

  return new SemanticMemory({
    ...common,
    embedder,
    vectorStore,
    scoreThreshold: parsed.scoreThreshold,
    scrollPageSize: parsed.scrollPageSize,
  });
}

export function createMemoryBackend(
  config: MemoryConfig,
  deps: MemoryDependencies = {},
): MemoryBackend {
  return buildBackend(parseMemoryConfig(config), deps);
}

/** Builds a store whose `dump` also writes `config` (without API keys). */
export function createMemoryStore(
  config: MemoryConfig,
  deps: MemoryDependencies = {},
): MemoryStore {
  const parsed = parseMemoryConfig(config);
  return new MemoryStore(buildBackend(parsed, deps), {
    config: parsed,
    storage: deps.storage,
  });
}

/**
 * Reopens a store from a directory written by `MemoryStore.dump`: reads its
 * `config.json`, builds the store and loads the snapshot into it. API keys
 * come from `deps` or the environment, since the file never holds them.
 */
export async function createMemoryStoreFromPath(
  dir: string,
  deps: MemoryDependencies = {},
): Promise<MemoryStore> {
  const file = configFile(dir);
  const raw = await readConfigFile(deps.storage ?? new FileSystemStorage(), file);
  if (raw === null) {
    throw new ConfigurationError(`No store configuration at ${file}`, {
      issues: [`${file}: Not found`],
    });
  }
  const store = createMemoryStore(parseMemoryConfig(raw), deps);
  await store.load(dir);
  return store;
}
