import type { Logger } from "../logging/logger.js";
import type { DataStorage } from "../storage/storage.js";
import type {
  MemoryRecord,
  MetadataFilter,
  RankedMemory,
} from "../types/memory.js";

export type MemoryBackendKind = "lexical" | "semantic";

/**
 * Storage and ranking strategy behind a MemoryStore. Records passed in are
 * already validated; ids passed in are well-formed.
 *
 * Instances are not safe for overlapping mutations: callers that issue
 * concurrent add/update/delete calls must serialize them themselves.
 */
export interface MemoryBackend {
  readonly kind: MemoryBackendKind;
  /** Connects to external dependencies. Safe to call repeatedly. */
  open(): Promise<void>;
  /** Inserts records whose ids are not present yet; returns the inserted ids. */
  add(records: MemoryRecord[]): Promise<string[]>;
  search(
    query: string,
    options: { topK: number; filter?: MetadataFilter },
  ): Promise<RankedMemory[]>;
  get(id: string): Promise<MemoryRecord | null>;
  getAll(): Promise<MemoryRecord[]>;
  /** Returns false, after logging, when no record has this id. */
  update(id: string, record: MemoryRecord): Promise<boolean>;
  delete(ids: string[]): Promise<void>;
  deleteAll(): Promise<void>;
  count(): Promise<number>;
  /** Writes a snapshot file into `dir`. */
  dump(dir: string): Promise<void>;
  /** Merges a snapshot from `dir`; returns how many records were added. */
  load(dir: string): Promise<number>;
}

export interface MemoryBackendOptions {
  logger?: Logger;
  storage?: DataStorage;
  /** File name used inside the dump/load directory. */
  snapshotFilename?: string;
}
