import { QdrantClient } from "@qdrant/js-client-rest";

import { VectorStoreError, statusCodeOf, toError } from "../errors.js";
import type {
  DistanceMetric,
  PayloadFilter,
  ScoredVectorPoint,
  ScrollOffset,
  ScrollPage,
  VectorPayload,
  VectorPoint,
  VectorStore,
} from "../types/vector-store.js";
import { distanceToScore } from "./similarity.js";

export const DEFAULT_COLLECTION_NAME = "memkit_memories";
export const DEFAULT_VECTOR_DIMENSION = 1536;

const QDRANT_DISTANCE = {
  cosine: "Cosine",
  dot: "Dot",
  euclid: "Euclid",
} as const;

/** Payload fields that get a keyword index so filtered search stays fast. */
const INDEXED_PAYLOAD_FIELDS = ["metadata.type", "metadata.source", "metadata.tags"];

export interface QdrantVectorStoreOptions {
  url?: string;
  apiKey?: string;
  collectionName?: string;
  vectorDimension?: number;
  distance?: DistanceMetric;
}

interface QdrantPointLike {
  id: string | number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

function toFilter(filter: PayloadFilter | undefined) {
  if (!filter || Object.keys(filter).length === 0) return undefined;
  return {
    must: Object.entries(filter).map(([key, value]) => ({
      key,
      match: { value },
    })),
  };
}

export class QdrantVectorStore implements VectorStore {
  readonly client: QdrantClient;
  readonly collectionName: string;
  readonly vectorDimension: number;
  readonly distance: DistanceMetric;
  private opening: Promise<void> | null = null;

  constructor(options: QdrantVectorStoreOptions = {}) {
    this.client = new QdrantClient({
      url: options.url ?? process.env.QDRANT_URL ?? "http://localhost:6333",
      apiKey: options.apiKey ?? process.env.QDRANT_API_KEY,
    });
    this.collectionName = options.collectionName ?? DEFAULT_COLLECTION_NAME;
    this.vectorDimension = options.vectorDimension ?? DEFAULT_VECTOR_DIMENSION;
    this.distance = options.distance ?? "cosine";
  }

  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.ensureCollection().catch((err: unknown) => {
        this.opening = null;
        throw err;
      });
    }
    return this.opening;
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.call("upsert", () =>
      this.client.upsert(this.collectionName, {
        wait: true,
        points: points.map((point) => ({
          id: point.id,
          vector: point.vector,
          payload: point.payload,
        })),
      }),
    );
  }

  async search(
    vector: number[],
    options: { limit: number; filter?: PayloadFilter },
  ): Promise<ScoredVectorPoint[]> {
    const results = await this.call("search", () =>
      this.client.search(this.collectionName, {
        vector,
        limit: options.limit,
        filter: toFilter(options.filter),
        with_payload: true,
        with_vector: true,
      }),
    );

    return results.map((result) => ({
      ...this.toPoint(result),
      score:
        this.distance === "euclid" ? distanceToScore(result.score) : result.score,
    }));
  }

  async retrieve(ids: string[]): Promise<VectorPoint[]> {
    if (ids.length === 0) return [];
    const results = await this.call("retrieve", () =>
      this.client.retrieve(this.collectionName, {
        ids,
        with_payload: true,
        with_vector: true,
      }),
    );
    return results.map((result) => this.toPoint(result));
  }

  async scroll(options: {
    limit: number;
    offset?: ScrollOffset;
  }): Promise<ScrollPage> {
    const page = await this.call("scroll", () =>
      this.client.scroll(this.collectionName, {
        limit: options.limit,
        offset: options.offset,
        with_payload: true,
        with_vector: true,
      }),
    );
    const next = page.next_page_offset;
    return {
      points: page.points.map((point) => this.toPoint(point)),
      nextOffset: typeof next === "string" || typeof next === "number" ? next : null,
    };
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.call("delete", () =>
      this.client.delete(this.collectionName, {
        wait: true,
        points: ids,
      }),
    );
  }

  /** Drops and recreates the collection. */
  async clear(): Promise<void> {
    await this.call("deleteCollection", () =>
      this.client.deleteCollection(this.collectionName),
    );
    this.opening = null;
    await this.open();
  }

  async count(): Promise<number> {
    const result = await this.call("count", () =>
      this.client.count(this.collectionName, { exact: true }),
    );
    return result.count;
  }

  private async ensureCollection(): Promise<void> {
    const { collections } = await this.call("getCollections", () =>
      this.client.getCollections(),
    );
    if (!collections.some((c) => c.name === this.collectionName)) {
      await this.ignoreConflict("createCollection", () =>
        this.client.createCollection(this.collectionName, {
          vectors: {
            size: this.vectorDimension,
            distance: QDRANT_DISTANCE[this.distance],
          },
        }),
      );
    }

    // Ensured on every open, whether or not the collection was new.
    await Promise.all(
      INDEXED_PAYLOAD_FIELDS.map((field) =>
        this.ignoreConflict("createPayloadIndex", () =>
          this.client.createPayloadIndex(this.collectionName, {
            field_name: field,
            field_schema: "keyword",
            wait: true,
          }),
        ),
      ),
    );
  }

  /** Runs a create call, treating 409 (already exists) as success. */
  private async ignoreConflict(action: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err: unknown) {
      if (statusCodeOf(err) === 409) return;
      throw new VectorStoreError(
        `Qdrant ${action} failed: ${err instanceof Error ? err.message : String(err)}`,
        { statusCode: statusCodeOf(err), cause: toError(err) },
      );
    }
  }

  private toPoint(raw: QdrantPointLike): VectorPoint {
    if (!isNumberArray(raw.vector)) {
      throw new VectorStoreError(
        `Qdrant point ${String(raw.id)} has no single dense vector`,
      );
    }
    const payload: VectorPayload = raw.payload ?? {};
    return { id: String(raw.id), vector: raw.vector, payload };
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof VectorStoreError) throw err;
      throw new VectorStoreError(
        `Qdrant ${action} failed: ${err instanceof Error ? err.message : String(err)}`,
        { statusCode: statusCodeOf(err), cause: toError(err) },
      );
    }
  }
}
