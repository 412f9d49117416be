import type { FilterValue } from "./memory.js";

export type DistanceMetric = "cosine" | "dot" | "euclid";

export type VectorPayload = Record<string, unknown>;

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: VectorPayload;
}

export interface ScoredVectorPoint extends VectorPoint {
  /** Higher means more similar, whatever the distance metric. */
  score: number;
}

/** Equality tests keyed by dotted payload path, e.g. `metadata.type`. */
export type PayloadFilter = Record<string, FilterValue>;

export type ScrollOffset = string | number;

export interface ScrollPage {
  points: VectorPoint[];
  nextOffset: ScrollOffset | null;
}

export interface VectorStore {
  readonly distance: DistanceMetric;
  open(): Promise<void>;
  upsert(points: VectorPoint[]): Promise<void>;
  search(
    vector: number[],
    options: { limit: number; filter?: PayloadFilter },
  ): Promise<ScoredVectorPoint[]>;
  retrieve(ids: string[]): Promise<VectorPoint[]>;
  scroll(options: { limit: number; offset?: ScrollOffset }): Promise<ScrollPage>;
  delete(ids: string[]): Promise<void>;
  clear(): Promise<void>;
  count(): Promise<number>;
}
