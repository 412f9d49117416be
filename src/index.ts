// Types
export type {
  // Memory
  MemorySource,
  MemoryMetadata,
  MemoryRecord,
  RankedMemory,
  MemoryMetadataInput,
  MemoryInput,
  StoredMemoryMetadata,
  StoredMemoryRecord,
  FilterValue,
  MetadataFilter,
  MemorySearchOptions,
  // Embedding
  EmbeddingProviderId,
  EmbeddingModel,
  EmbeddingProvider,
  // Vector store
  DistanceMetric,
  VectorPayload,
  VectorPoint,
  ScoredVectorPoint,
  PayloadFilter,
  ScrollOffset,
  ScrollPage,
  VectorStore,
} from "./types/index.js";

// Errors
export {
  MemkitError,
  ValidationError,
  ConfigurationError,
  BackendUnavailableError,
  EmbeddingApiError,
  VectorStoreError,
  SnapshotError,
  UnsupportedSnapshotFormatError,
} from "./errors.js";
export type { BackendDependency } from "./errors.js";

// Memory
export {
  MemoryStore,
  LexicalMemory,
  SemanticMemory,
  createMemoryBackend,
  createMemoryStore,
  createMemoryStoreFromPath,
  parseMemoryConfig,
  DEFAULT_TOP_K,
  CONFIG_FILENAME,
  DEFAULT_SNAPSHOT_FILENAME,
  RESERVED_METADATA_KEYS,
  LEXICAL_SNAPSHOT_FORMAT,
  SEMANTIC_SNAPSHOT_FORMAT,
} from "./memory/index.js";
export type {
  MemoryBackend,
  MemoryBackendKind,
  MemoryBackendOptions,
  SemanticMemoryOptions,
  MemoryStoreOptions,
  MemoryConfig,
  ResolvedMemoryConfig,
  EmbedderConfig,
  VectorStoreConfig,
  MemoryDependencies,
} from "./memory/index.js";

// Config
export { loadMemoryConfig } from "./config/index.js";

// Embedding
export { createEmbeddingProvider, knownEmbeddingDimension } from "./embedding/index.js";
export type { EmbeddingProviderOptions } from "./embedding/index.js";
export { OpenAIEmbeddingProvider } from "./embedding/providers/openai.js";
export { OllamaEmbeddingProvider } from "./embedding/providers/ollama.js";

// Vector store
export { InMemoryVectorStore, QdrantVectorStore } from "./vector-store/index.js";
export type { QdrantVectorStoreOptions } from "./vector-store/index.js";

// Storage
export type { DataStorage } from "./storage/index.js";
export { FileSystemStorage } from "./storage/index.js";

// Logging
export { StructuredLogger, createLogger } from "./logging/index.js";
export type { Logger, LogLevel } from "./logging/index.js";
