export type {
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
} from "./memory.js";

export type {
  EmbeddingProviderId,
  EmbeddingModel,
  EmbeddingProvider,
} from "./embedding.js";

export type {
  DistanceMetric,
  VectorPayload,
  VectorPoint,
  ScoredVectorPoint,
  PayloadFilter,
  ScrollOffset,
  ScrollPage,
  VectorStore,
} from "./vector-store.js";
