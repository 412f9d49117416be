import { z } from "zod";

import { ValidationError } from "../errors.js";
import { FileSystemStorage } from "../storage/fs.js";
import type { DataStorage } from "../storage/storage.js";
import type {
  MemoryInput,
  MemoryRecord,
  MemorySearchOptions,
  RankedMemory,
} from "../types/memory.js";
import type { MemoryBackend, MemoryBackendKind } from "./backend.js";
import type { ResolvedMemoryConfig } from "./factory.js";
import { MemoryIdSchema, createMemoryRecord, formatIssues } from "./item.js";
import { configFile, writeConfigFile } from "./snapshot.js";

export const DEFAULT_TOP_K = 5;

const SearchOptionsSchema = z
  .object({
    topK: z.number().int().positive().optional(),
    filter: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  })
  .strict();

export interface MemoryStoreOptions {
  /** Written to `config.json` on every dump. API keys are left out. */
  config?: ResolvedMemoryConfig;
  storage?: DataStorage;
}

function withoutSecrets(config: ResolvedMemoryConfig): ResolvedMemoryConfig {
  const copy = structuredClone(config);
  if (copy.backend === "semantic") {
    if (copy.embedder) delete copy.embedder.apiKey;
    if (copy.vectorStore?.provider === "qdrant") delete copy.vectorStore.apiKey;
  }
  return copy;
}

function checkId(id: string): void {
  const parsed = MemoryIdSchema.safeParse(id);
  if (!parsed.success) {
    throw new ValidationError(`Invalid memory id: ${id}`, {
      issues: formatIssues(parsed.error),
      cause: parsed.error,
    });
  }
}

/**
 * Caller-facing memory store. Validates every input, then hands it to the
 * configured backend, so behaviour is the same whichever backend is in use.
 *
 * A store has a single logical owner. It does no locking, so overlapping
 * add/update/delete calls on one instance must be serialized by the caller.
 */
export class MemoryStore {
  readonly backend: MemoryBackend;
  private readonly config?: ResolvedMemoryConfig;
  private readonly storage: DataStorage;

  constructor(backend: MemoryBackend, options: MemoryStoreOptions = {}) {
    this.backend = backend;
    this.config = options.config && withoutSecrets(options.config);
    this.storage = options.storage ?? new FileSystemStorage();
  }

  get kind(): MemoryBackendKind {
    return this.backend.kind;
  }

  /** Connects the backend. Other methods do this on first use. */
  async open(): Promise<void> {
    await this.backend.open();
  }

  /**
   * Adds one or more memories. Ids already stored, or repeated within the
   * call, are skipped; the returned ids are those actually inserted.
   */
  async add(inputs: MemoryInput | MemoryInput[]): Promise<string[]> {
    const list = Array.isArray(inputs) ? inputs : [inputs];
    const records = list.map(createMemoryRecord);
    if (records.length === 0) return [];
    return this.backend.add(records);
  }

  async search(
    query: string,
    options: MemorySearchOptions = {},
  ): Promise<RankedMemory[]> {
    const parsed = SearchOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError("Invalid search options", {
        issues: formatIssues(parsed.error),
        cause: parsed.error,
      });
    }
    if (query.trim().length === 0) return [];
    return this.backend.search(query, {
      topK: parsed.data.topK ?? DEFAULT_TOP_K,
      filter: parsed.data.filter,
    });
  }

  async get(id: string): Promise<MemoryRecord | null> {
    checkId(id);
    return this.backend.get(id);
  }

  async getAll(): Promise<MemoryRecord[]> {
    return this.backend.getAll();
  }

  /**
   * Replaces text and metadata of an existing memory. The creation time is
   * kept and the update time moves forward. Resolves false for unknown ids.
   */
  async update(id: string, input: MemoryInput): Promise<boolean> {
    checkId(id);
    return this.backend.update(id, createMemoryRecord(input));
  }

  async delete(ids: string | string[]): Promise<void> {
    const list = Array.isArray(ids) ? ids : [ids];
    list.forEach(checkId);
    if (list.length === 0) return;
    await this.backend.delete(list);
  }

  async deleteAll(): Promise<void> {
    await this.backend.deleteAll();
  }

  async count(): Promise<number> {
    return this.backend.count();
  }

  /**
   * Writes the snapshot into `dir`. A store built from a configuration also
   * writes that configuration, so `createMemoryStoreFromPath` can reopen it.
   */
  async dump(dir: string): Promise<void> {
    if (this.config) {
      await writeConfigFile(this.storage, configFile(dir), this.config);
    }
    await this.backend.dump(dir);
  }

  async load(dir: string): Promise<number> {
    return this.backend.load(dir);
  }
}
