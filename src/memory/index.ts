export type { MemoryBackend, MemoryBackendKind, MemoryBackendOptions } from "./backend.js";
export { BM25Model, DEFAULT_BM25_CONFIG, tokenize } from "./bm25.js";
export type { BM25Config } from "./bm25.js";
export { matchesFilter } from "./filter.js";
export {
  MemoryInputSchema,
  MemoryMetadataInputSchema,
  RESERVED_METADATA_KEYS,
  StoredMemoryRecordSchema,
  createMemoryRecord,
  fromStoredRecord,
  isMemoryId,
  toStoredRecord,
} from "./item.js";
export { LexicalMemory } from "./lexical.js";
export { DEFAULT_SCROLL_PAGE_SIZE, SemanticMemory } from "./semantic.js";
export type { SemanticMemoryOptions } from "./semantic.js";
export {
  CONFIG_FILENAME,
  DEFAULT_SNAPSHOT_FILENAME,
  LEXICAL_SNAPSHOT_FORMAT,
  SEMANTIC_SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
} from "./snapshot.js";
export type { LexicalSnapshot, SemanticSnapshot, SnapshotFormat } from "./snapshot.js";
export { DEFAULT_TOP_K, MemoryStore } from "./store.js";
export type { MemoryStoreOptions } from "./store.js";
export {
  MemoryConfigSchema,
  createMemoryBackend,
  createMemoryStore,
  createMemoryStoreFromPath,
  parseMemoryConfig,
} from "./factory.js";
export type {
  EmbedderConfig,
  MemoryConfig,
  MemoryDependencies,
  ResolvedMemoryConfig,
  VectorStoreConfig,
} from "./factory.js";
