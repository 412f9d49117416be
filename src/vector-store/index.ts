export type {
  DistanceMetric,
  PayloadFilter,
  ScoredVectorPoint,
  ScrollOffset,
  ScrollPage,
  VectorPayload,
  VectorPoint,
  VectorStore,
} from "../types/vector-store.js";

export { InMemoryVectorStore } from "./memory.js";
export {
  DEFAULT_COLLECTION_NAME,
  DEFAULT_VECTOR_DIMENSION,
  QdrantVectorStore,
} from "./qdrant.js";
export type { QdrantVectorStoreOptions } from "./qdrant.js";
export {
  cosineSimilarity,
  distanceToScore,
  dotProduct,
  euclideanDistance,
  similarity,
} from "./similarity.js";
