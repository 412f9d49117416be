import type {
  DistanceMetric,
  PayloadFilter,
  ScoredVectorPoint,
  ScrollOffset,
  ScrollPage,
  VectorPoint,
  VectorStore,
} from "../types/vector-store.js";
import { matchesFilter } from "../memory/filter.js";
import { similarity } from "./similarity.js";

function copyPoint(point: VectorPoint): VectorPoint {
  return {
    id: point.id,
    vector: [...point.vector],
    payload: structuredClone(point.payload),
  };
}

/**
 * Vector store kept in process memory. Points iterate in insertion order and
 * every search is an exhaustive scan, which suits small collections and tests.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly distance: DistanceMetric;
  private readonly points: Map<string, VectorPoint> = new Map();

  constructor(options?: { distance?: DistanceMetric }) {
    this.distance = options?.distance ?? "cosine";
  }

  async open(): Promise<void> {}

  async upsert(points: VectorPoint[]): Promise<void> {
    for (const point of points) {
      this.points.set(point.id, copyPoint(point));
    }
  }

  async search(
    vector: number[],
    options: { limit: number; filter?: PayloadFilter },
  ): Promise<ScoredVectorPoint[]> {
    const scored: ScoredVectorPoint[] = [];
    for (const point of this.points.values()) {
      if (!matchesFilter(point.payload, options.filter)) continue;
      scored.push({
        ...copyPoint(point),
        score: similarity(this.distance, vector, point.vector),
      });
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, options.limit);
  }

  async retrieve(ids: string[]): Promise<VectorPoint[]> {
    const found: VectorPoint[] = [];
    for (const id of ids) {
      const point = this.points.get(id);
      if (point) found.push(copyPoint(point));
    }
    return found;
  }

  async scroll(options: {
    limit: number;
    offset?: ScrollOffset;
  }): Promise<ScrollPage> {
    const start = typeof options.offset === "number" ? options.offset : 0;
    const all = [...this.points.values()];
    const end = start + options.limit;
    return {
      points: all.slice(start, end).map(copyPoint),
      nextOffset: end < all.length ? end : null,
    };
  }

  async delete(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.points.delete(id);
    }
  }

  async clear(): Promise<void> {
    this.points.clear();
  }

  async count(): Promise<number> {
    return this.points.size;
  }
}
