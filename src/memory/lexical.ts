import { createLogger, describeError, type Logger } from "../logging/logger.js";
import { FileSystemStorage } from "../storage/fs.js";
import type { DataStorage } from "../storage/storage.js";
import type {
  MemoryRecord,
  MetadataFilter,
  RankedMemory,
} from "../types/memory.js";
import type { MemoryBackend, MemoryBackendOptions } from "./backend.js";
import { BM25Model, tokenize } from "./bm25.js";
import { matchesFilter } from "./filter.js";
import { applyUpdate, cloneRecord, toStoredMetadata } from "./item.js";
import {
  decodeLexicalSnapshot,
  encodeLexicalSnapshot,
  readSnapshotFile,
  snapshotFile,
  writeSnapshotFile,
} from "./snapshot.js";

/**
 * In-process backend ranking by BM25 term relevance.
 *
 * The ranking model is rebuilt from the current records on every search, so
 * there is no index to keep in sync with mutations.
 */
export class LexicalMemory implements MemoryBackend {
  readonly kind = "lexical" as const;
  private records: MemoryRecord[] = [];
  private readonly ids = new Set<string>();
  private readonly logger: Logger;
  private readonly storage: DataStorage;
  private readonly snapshotFilename?: string;

  constructor(options: MemoryBackendOptions = {}) {
    this.logger = options.logger ?? createLogger("memory.lexical");
    this.storage = options.storage ?? new FileSystemStorage();
    this.snapshotFilename = options.snapshotFilename;
  }

  async open(): Promise<void> {}

  async add(records: MemoryRecord[]): Promise<string[]> {
    const added: string[] = [];
    for (const record of records) {
      if (this.ids.has(record.id)) {
        this.logger.debug("Skipped duplicate memory", { id: record.id });
        continue;
      }
      this.records.push(cloneRecord(record));
      this.ids.add(record.id);
      added.push(record.id);
    }
    this.logger.debug("Added memories", { count: added.length });
    return added;
  }

  async search(
    query: string,
    options: { topK: number; filter?: MetadataFilter },
  ): Promise<RankedMemory[]> {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) return [];

    const candidates = this.records.filter((record) =>
      matchesFilter(toStoredMetadata(record.metadata), options.filter),
    );
    if (candidates.length === 0) return [];

    const model = new BM25Model(candidates.map((record) => tokenize(record.text)));
    const scores = model.scores(queryTokens);

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    return candidates
      .map((record, index) => ({ record, score: scores[index] }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, options.topK)
      .map(({ record, score }) => ({ ...cloneRecord(record), score }));
  }

  async get(id: string): Promise<MemoryRecord | null> {
    const record = this.records.find((r) => r.id === id);
    return record ? cloneRecord(record) : null;
  }

  async getAll(): Promise<MemoryRecord[]> {
    return this.records.map(cloneRecord);
  }

  async update(id: string, record: MemoryRecord): Promise<boolean> {
    const index = this.records.findIndex((r) => r.id === id);
    if (index < 0) {
      this.logger.warn("Memory not found for update", { id });
      return false;
    }
    this.records[index] = applyUpdate(this.records[index], cloneRecord(record));
    this.logger.debug("Updated memory", { id });
    return true;
  }

  async delete(ids: string[]): Promise<void> {
    const targets = new Set(ids);
    const before = this.records.length;
    this.records = this.records.filter((record) => !targets.has(record.id));
    for (const id of targets) {
      this.ids.delete(id);
    }
    this.logger.debug("Deleted memories", {
      requested: targets.size,
      deleted: before - this.records.length,
    });
  }

  async deleteAll(): Promise<void> {
    const count = this.records.length;
    this.records = [];
    this.ids.clear();
    this.logger.info("Deleted all memories", { count });
  }

  async count(): Promise<number> {
    return this.records.length;
  }

  async dump(dir: string): Promise<void> {
    const file = snapshotFile(dir, this.snapshotFilename);
    await writeSnapshotFile(this.storage, file, encodeLexicalSnapshot(this.records));
    this.logger.info("Dumped memories", { count: this.records.length, file });
  }

  async load(dir: string): Promise<number> {
    const file = snapshotFile(dir, this.snapshotFilename);
    const raw = await readSnapshotFile(this.storage, file);
    if (raw === null) {
      this.logger.warn("Memory snapshot not found", { file });
      return 0;
    }

    let loaded: MemoryRecord[];
    try {
      loaded = decodeLexicalSnapshot(raw, file);
    } catch (err: unknown) {
      this.logger.error("Failed to load memory snapshot", {
        file,
        error: describeError(err),
      });
      throw err;
    }

    const added = await this.add(loaded);
    this.logger.info("Loaded memories", {
      file,
      inSnapshot: loaded.length,
      added: added.length,
    });
    return added.length;
  }
}
