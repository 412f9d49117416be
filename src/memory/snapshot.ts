import * as path from "node:path";
import { z } from "zod";

import { SnapshotError, UnsupportedSnapshotFormatError, toError } from "../errors.js";
import type { DataStorage } from "../storage/storage.js";
import type { MemoryRecord, StoredMemoryRecord } from "../types/memory.js";
import type { VectorPoint } from "../types/vector-store.js";
import {
  MemoryIdSchema,
  StoredMemoryRecordSchema,
  formatIssues,
  fromStoredRecord,
  toStoredRecord,
} from "./item.js";

export const DEFAULT_SNAPSHOT_FILENAME = "memories.json";
/** Store configuration written beside the snapshot by `MemoryStore.dump`. */
export const CONFIG_FILENAME = "config.json";
export const SNAPSHOT_VERSION = 1;

export const LEXICAL_SNAPSHOT_FORMAT = "memkit/lexical";
export const SEMANTIC_SNAPSHOT_FORMAT = "memkit/semantic";

export type SnapshotFormat =
  | typeof LEXICAL_SNAPSHOT_FORMAT
  | typeof SEMANTIC_SNAPSHOT_FORMAT;

const LexicalSnapshotSchema = z.object({
  format: z.literal(LEXICAL_SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  records: z.array(StoredMemoryRecordSchema),
});

const SemanticSnapshotSchema = z.object({
  format: z.literal(SEMANTIC_SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  points: z.array(
    z.object({
      id: MemoryIdSchema,
      vector: z.array(z.number()).min(1),
      payload: StoredMemoryRecordSchema,
    }),
  ),
});

export interface LexicalSnapshot {
  format: typeof LEXICAL_SNAPSHOT_FORMAT;
  version: typeof SNAPSHOT_VERSION;
  records: StoredMemoryRecord[];
}

export interface SemanticSnapshot {
  format: typeof SEMANTIC_SNAPSHOT_FORMAT;
  version: typeof SNAPSHOT_VERSION;
  points: { id: string; vector: number[]; payload: StoredMemoryRecord }[];
}

export function snapshotFile(dir: string, filename?: string): string {
  return path.join(dir, filename ?? DEFAULT_SNAPSHOT_FILENAME);
}

export function configFile(dir: string): string {
  return path.join(dir, CONFIG_FILENAME);
}

export function encodeLexicalSnapshot(records: MemoryRecord[]): LexicalSnapshot {
  return {
    format: LEXICAL_SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    records: records.map(toStoredRecord),
  };
}

export function encodeSemanticSnapshot(
  points: { id: string; vector: number[]; record: MemoryRecord }[],
): SemanticSnapshot {
  return {
    format: SEMANTIC_SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    points: points.map((point) => ({
      id: point.id,
      vector: point.vector,
      payload: toStoredRecord(point.record),
    })),
  };
}

function parseJson(raw: string, file: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new SnapshotError(`Snapshot ${file} is not valid JSON`, {
      path: file,
      cause: toError(err),
    });
  }
}

function readFormat(value: unknown): string {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return "unknown";
  }
  const format = Reflect.get(value, "format");
  return typeof format === "string" ? format : "unknown";
}

function checkFormat(value: unknown, expected: SnapshotFormat, file: string): void {
  const found = readFormat(value);
  if (found !== expected) {
    throw new UnsupportedSnapshotFormatError(
      `Unsupported snapshot format in ${file}: expected "${expected}", found "${found}"`,
      { path: file, expected, found },
    );
  }
}

export function decodeLexicalSnapshot(raw: string, file: string): MemoryRecord[] {
  const value = parseJson(raw, file);
  checkFormat(value, LEXICAL_SNAPSHOT_FORMAT, file);

  const parsed = LexicalSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    throw new SnapshotError(`Snapshot ${file} is malformed`, {
      path: file,
      issues: formatIssues(parsed.error),
      cause: parsed.error,
    });
  }
  return parsed.data.records.map(fromStoredRecord);
}

export function decodeSemanticSnapshot(raw: string, file: string): VectorPoint[] {
  const value = parseJson(raw, file);
  checkFormat(value, SEMANTIC_SNAPSHOT_FORMAT, file);

  const parsed = SemanticSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    throw new SnapshotError(`Snapshot ${file} is malformed`, {
      path: file,
      issues: formatIssues(parsed.error),
      cause: parsed.error,
    });
  }

  return parsed.data.points.map((point, index) => {
    if (point.payload.id !== point.id) {
      throw new SnapshotError(`Snapshot ${file} is malformed`, {
        path: file,
        issues: [`points.${index}.payload.id: does not match point id ${point.id}`],
      });
    }
    // Round-trip through the record model so the payload is in canonical form.
    const record = fromStoredRecord(point.payload);
    return {
      id: point.id,
      vector: point.vector,
      payload: { ...toStoredRecord(record) },
    };
  });
}

export async function readSnapshotFile(
  storage: DataStorage,
  file: string,
): Promise<string | null> {
  try {
    return await storage.readText(file);
  } catch (err: unknown) {
    throw new SnapshotError(`Failed to read snapshot ${file}`, {
      path: file,
      cause: toError(err),
    });
  }
}

export async function writeSnapshotFile(
  storage: DataStorage,
  file: string,
  snapshot: LexicalSnapshot | SemanticSnapshot,
): Promise<void> {
  try {
    await storage.writeText(file, JSON.stringify(snapshot, null, 2) + "\n");
  } catch (err: unknown) {
    throw new SnapshotError(`Failed to write snapshot ${file}`, {
      path: file,
      cause: toError(err),
    });
  }
}

export async function writeConfigFile(
  storage: DataStorage,
  file: string,
  config: object,
): Promise<void> {
  try {
    await storage.writeText(file, JSON.stringify(config, null, 2) + "\n");
  } catch (err: unknown) {
    throw new SnapshotError(`Failed to write store configuration ${file}`, {
      path: file,
      cause: toError(err),
    });
  }
}

/** Resolves the parsed JSON of a configuration file, or null when it is absent. */
export async function readConfigFile(
  storage: DataStorage,
  file: string,
): Promise<unknown> {
  let raw: string | null;
  try {
    raw = await storage.readText(file);
  } catch (err: unknown) {
    throw new SnapshotError(`Failed to read store configuration ${file}`, {
      path: file,
      cause: toError(err),
    });
  }
  return raw === null ? null : parseJson(raw, file);
}
