export type MemorySource = "conversation" | "manual" | "document" | "system";

export interface MemoryMetadata {
  /** Free-form category such as "fact", "preference" or "event". */
  type?: string;
  source?: MemorySource;
  tags?: string[];
  /** ISO-8601 creation time. Never changes once the record exists. */
  createdAt: string;
  /** ISO-8601 time of the last explicit update. */
  updatedAt: string;
  /** Keys outside the known fields, kept as given. */
  extra: Record<string, unknown>;
}

export interface MemoryRecord {
  id: string;
  text: string;
  metadata: MemoryMetadata;
}

export interface RankedMemory extends MemoryRecord {
  score: number;
}

export interface MemoryMetadataInput {
  type?: string;
  source?: MemorySource;
  tags?: string[];
  createdAt?: string;
  updatedAt?: string;
  extra?: Record<string, unknown>;
}

export type MemoryInput =
  | string
  | {
      id?: string;
      text: string;
      metadata?: MemoryMetadataInput;
    };

/**
 * Metadata as it is written to snapshots and vector-store payloads: the
 * known fields in snake case with every extra key flattened beside them.
 */
export interface StoredMemoryMetadata {
  type?: string;
  source?: MemorySource;
  tags?: string[];
  created_at: string;
  updated_at: string;
  [key: string]: unknown;
}

export interface StoredMemoryRecord {
  id: string;
  text: string;
  metadata: StoredMemoryMetadata;
}

export type FilterValue = string | number | boolean;

/** Equality tests over stored metadata keys, all of which must hold. */
export type MetadataFilter = Record<string, FilterValue>;

export interface MemorySearchOptions {
  topK?: number;
  filter?: MetadataFilter;
}
