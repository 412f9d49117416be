import {
  BackendUnavailableError,
  EmbeddingApiError,
  VectorStoreError,
  toError,
  type BackendDependency,
} from "../errors.js";
import { createLogger, describeError, type Logger } from "../logging/logger.js";
import { FileSystemStorage } from "../storage/fs.js";
import type { DataStorage } from "../storage/storage.js";
import type { EmbeddingProvider } from "../types/embedding.js";
import type {
  MemoryRecord,
  MetadataFilter,
  RankedMemory,
} from "../types/memory.js";
import type {
  PayloadFilter,
  ScrollOffset,
  VectorPayload,
  VectorPoint,
  VectorStore,
} from "../types/vector-store.js";
import type { MemoryBackend, MemoryBackendOptions } from "./backend.js";
import {
  applyUpdate,
  formatIssues,
  isMemoryId,
  parseStoredRecord,
  toStoredRecord,
} from "./item.js";
import {
  decodeSemanticSnapshot,
  encodeSemanticSnapshot,
  readSnapshotFile,
  snapshotFile,
  writeSnapshotFile,
} from "./snapshot.js";

export const DEFAULT_SCROLL_PAGE_SIZE = 100;

export interface SemanticMemoryOptions extends MemoryBackendOptions {
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  /**
   * Minimum similarity a search hit must reach. Unset means no floor: the
   * nearest `topK` points are returned however weak the match.
   */
  scoreThreshold?: number;
  /** Points fetched per scroll request when listing the collection. */
  scrollPageSize?: number;
}

function toPayload(record: MemoryRecord): VectorPayload {
  return { ...toStoredRecord(record) };
}

function toPayloadFilter(filter: MetadataFilter | undefined): PayloadFilter | undefined {
  if (!filter) return undefined;
  const translated: PayloadFilter = {};
  for (const [key, value] of Object.entries(filter)) {
    translated[`metadata.${key}`] = value;
  }
  return translated;
}

/** Dependency errors with a 4xx status: the request was refused as sent. */
function isRequestRejection(err: unknown): boolean {
  if (!(err instanceof EmbeddingApiError || err instanceof VectorStoreError)) return false;
  const status = err.statusCode;
  return status !== undefined && status >= 400 && status < 500;
}

/**
 * Backend ranking by embedding similarity. Records live as vector-store
 * points whose payload is the stored record; nothing is cached in process.
 */
export class SemanticMemory implements MemoryBackend {
  readonly kind = "semantic" as const;
  readonly embedder: EmbeddingProvider;
  readonly vectorStore: VectorStore;
  private readonly scoreThreshold?: number;
  private readonly scrollPageSize: number;
  private readonly logger: Logger;
  private readonly storage: DataStorage;
  private readonly snapshotFilename?: string;
  private opening: Promise<void> | null = null;

  constructor(options: SemanticMemoryOptions) {
    this.embedder = options.embedder;
    this.vectorStore = options.vectorStore;
    this.scoreThreshold = options.scoreThreshold;
    this.scrollPageSize = options.scrollPageSize ?? DEFAULT_SCROLL_PAGE_SIZE;
    this.logger = options.logger ?? createLogger("memory.semantic");
    this.storage = options.storage ?? new FileSystemStorage();
    this.snapshotFilename = options.snapshotFilename;
  }

  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.guard("vector_store", "open vector store", () =>
        this.vectorStore.open(),
      ).catch((err: unknown) => {
        this.opening = null;
        throw err;
      });
    }
    return this.opening;
  }

  async add(records: MemoryRecord[]): Promise<string[]> {
    await this.open();

    const unique: MemoryRecord[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      if (seen.has(record.id)) continue;
      seen.add(record.id);
      unique.push(record);
    }
    if (unique.length === 0) return [];

    const existing = await this.guard("vector_store", "look up existing memories", () =>
      this.vectorStore.retrieve(unique.map((record) => record.id)),
    );
    const existingIds = new Set(existing.map((point) => point.id));
    const fresh = unique.filter((record) => !existingIds.has(record.id));
    if (fresh.length === 0) return [];

    const vectors = await this.embed(fresh.map((record) => record.text));
    await this.guard("vector_store", "upsert memories", () =>
      this.vectorStore.upsert(
        fresh.map((record, i) => ({
          id: record.id,
          vector: vectors[i],
          payload: toPayload(record),
        })),
      ),
    );

    this.logger.debug("Added memories with embeddings", {
      count: fresh.length,
      skipped: records.length - fresh.length,
    });
    return fresh.map((record) => record.id);
  }

  async search(
    query: string,
    options: { topK: number; filter?: MetadataFilter },
  ): Promise<RankedMemory[]> {
    if (query.trim().length === 0) return [];
    await this.open();

    const [vector] = await this.embed([query]);
    const hits = await this.guard("vector_store", "search memories", () =>
      this.vectorStore.search(vector, {
        limit: options.topK,
        filter: toPayloadFilter(options.filter),
      }),
    );

    const threshold = this.scoreThreshold;
    const ranked: RankedMemory[] = [];
    for (const hit of hits) {
      if (threshold !== undefined && hit.score < threshold) continue;
      const record = this.toRecord(hit);
      if (record) ranked.push({ ...record, score: hit.score });
    }

    // Not every store returns hits ordered by score.
    ranked.sort((a, b) => b.score - a.score);
    return ranked.slice(0, options.topK);
  }

  async get(id: string): Promise<MemoryRecord | null> {
    if (!isMemoryId(id)) return null;
    await this.open();
    const [point] = await this.guard("vector_store", "retrieve memory", () =>
      this.vectorStore.retrieve([id]),
    );
    return point ? this.toRecord(point) : null;
  }

  async getAll(): Promise<MemoryRecord[]> {
    const records: MemoryRecord[] = [];
    for (const point of await this.listPoints()) {
      const record = this.toRecord(point);
      if (record) records.push(record);
    }
    return records;
  }

  async update(id: string, record: MemoryRecord): Promise<boolean> {
    const existing = await this.get(id);
    if (!existing) {
      this.logger.warn("Memory not found for update", { id });
      return false;
    }

    const next = applyUpdate(existing, record);
    const [vector] = await this.embed([next.text]);
    await this.guard("vector_store", "update memory", () =>
      this.vectorStore.upsert([{ id, vector, payload: toPayload(next) }]),
    );
    this.logger.debug("Updated memory", { id });
    return true;
  }

  async delete(ids: string[]): Promise<void> {
    const valid = ids.filter(isMemoryId);
    if (valid.length === 0) return;
    await this.open();
    await this.guard("vector_store", "delete memories", () =>
      this.vectorStore.delete(valid),
    );
    this.logger.debug("Deleted memories", { requested: valid.length });
  }

  async deleteAll(): Promise<void> {
    await this.open();
    await this.guard("vector_store", "clear memories", () => this.vectorStore.clear());
    this.logger.info("Deleted all memories");
  }

  async count(): Promise<number> {
    await this.open();
    return this.guard("vector_store", "count memories", () => this.vectorStore.count());
  }

  async dump(dir: string): Promise<void> {
    const file = snapshotFile(dir, this.snapshotFilename);
    const points: { id: string; vector: number[]; record: MemoryRecord }[] = [];
    for (const point of await this.listPoints()) {
      const record = this.toRecord(point);
      if (record) points.push({ id: point.id, vector: point.vector, record });
    }
    await writeSnapshotFile(this.storage, file, encodeSemanticSnapshot(points));
    this.logger.info("Dumped memories", { count: points.length, file });
  }

  async load(dir: string): Promise<number> {
    const file = snapshotFile(dir, this.snapshotFilename);
    const raw = await readSnapshotFile(this.storage, file);
    if (raw === null) {
      this.logger.warn("Memory snapshot not found", { file });
      return 0;
    }

    let points: VectorPoint[];
    try {
      points = decodeSemanticSnapshot(raw, file);
    } catch (err: unknown) {
      this.logger.error("Failed to load memory snapshot", {
        file,
        error: describeError(err),
      });
      throw err;
    }

    await this.open();
    const existing = await this.guard("vector_store", "look up existing memories", () =>
      this.vectorStore.retrieve(points.map((point) => point.id)),
    );
    const existingIds = new Set(existing.map((point) => point.id));
    const fresh: VectorPoint[] = [];
    for (const point of points) {
      if (existingIds.has(point.id)) continue;
      existingIds.add(point.id);
      fresh.push(point);
    }

    // Vectors come from the snapshot, so nothing is re-embedded.
    await this.guard("vector_store", "restore memories", () =>
      this.vectorStore.upsert(fresh),
    );
    this.logger.info("Loaded memories", {
      file,
      inSnapshot: points.length,
      added: fresh.length,
    });
    return fresh.length;
  }

  private async listPoints(): Promise<VectorPoint[]> {
    await this.open();
    const points: VectorPoint[] = [];
    let offset: ScrollOffset | undefined;
    for (;;) {
      const page = await this.guard("vector_store", "list memories", () =>
        this.vectorStore.scroll({ limit: this.scrollPageSize, offset }),
      );
      points.push(...page.points);
      if (page.nextOffset === null || page.points.length === 0) break;
      offset = page.nextOffset;
    }
    return points;
  }

  private toRecord(point: VectorPoint): MemoryRecord | null {
    const parsed = parseStoredRecord(point.payload);
    if (!parsed.success) {
      this.logger.warn("Ignoring vector point without a memory payload", {
        id: point.id,
        issues: formatIssues(parsed.error),
      });
      return null;
    }
    return parsed.record;
  }

  private async embed(texts: string[]): Promise<number[][]> {
    const vectors = await this.guard("embedder", "embed texts", () =>
      this.embedder.embedBatch(texts),
    );
    if (vectors.length !== texts.length) {
      throw new BackendUnavailableError(
        `Embedder returned ${vectors.length} vectors for ${texts.length} texts`,
        { dependency: "embedder" },
      );
    }
    return vectors;
  }

  private async guard<T>(
    dependency: BackendDependency,
    action: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof BackendUnavailableError || isRequestRejection(err)) throw err;
      throw new BackendUnavailableError(
        `Failed to ${action}: ${describeError(err)}`,
        { dependency, cause: toError(err) },
      );
    }
  }
}
