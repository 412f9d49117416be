import { randomUUID } from "node:crypto";
import { z } from "zod";

import { ValidationError } from "../errors.js";
import type {
  MemoryInput,
  MemoryMetadata,
  MemoryRecord,
  StoredMemoryMetadata,
  StoredMemoryRecord,
} from "../types/memory.js";

export const MemorySourceSchema = z.enum([
  "conversation",
  "manual",
  "document",
  "system",
]);

export const MemoryIdSchema = z.string().uuid();

const nonBlank = (value: string) => value.trim().length > 0;

type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

/** Stored metadata keys that `extra` may not shadow. */
export const RESERVED_METADATA_KEYS: readonly string[] = [
  "type",
  "source",
  "tags",
  "created_at",
  "updated_at",
];

export const MemoryMetadataInputSchema = z
  .object({
    type: z.string().optional(),
    source: MemorySourceSchema.optional(),
    tags: z.array(z.string()).optional(),
    createdAt: z.string().datetime({ offset: true }).optional(),
    updatedAt: z.string().datetime({ offset: true }).optional(),
    extra: z
      .record(JsonValueSchema)
      .superRefine((extra, ctx) => {
        for (const key of Object.keys(extra)) {
          if (RESERVED_METADATA_KEYS.includes(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [key],
              message: `"${key}" is a reserved metadata key`,
            });
          }
        }
      })
      .optional(),
  })
  .strict()
  .superRefine((metadata, ctx) => {
    if (metadata.updatedAt === undefined) return;
    if (metadata.createdAt === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["updatedAt"],
        message: "updatedAt requires createdAt",
      });
    } else if (Date.parse(metadata.updatedAt) < Date.parse(metadata.createdAt)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["updatedAt"],
        message: "updatedAt must not be earlier than createdAt",
      });
    }
  });

export const MemoryInputSchema = z.union([
  z.string().refine(nonBlank, { message: "Memory text must not be empty" }),
  z
    .object({
      id: MemoryIdSchema.optional(),
      text: z.string().refine(nonBlank, { message: "Memory text must not be empty" }),
      metadata: MemoryMetadataInputSchema.optional(),
    })
    .strict(),
]);

const KNOWN_STORED_KEYS = new Set(RESERVED_METADATA_KEYS);

export const StoredMemoryMetadataSchema = z
  .object({
    type: z.string().optional(),
    source: MemorySourceSchema.optional(),
    tags: z.array(z.string()).optional(),
    created_at: z.string().min(1),
    updated_at: z.string().min(1),
  })
  .passthrough();

export const StoredMemoryRecordSchema = z.object({
  id: MemoryIdSchema,
  text: z.string().refine(nonBlank, { message: "Memory text must not be empty" }),
  metadata: StoredMemoryMetadataSchema,
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Returns an ISO timestamp for now, or one millisecond past `previous` when
 * the clock has not moved beyond it, so successive updates always increase.
 */
export function nextTimestamp(previous?: string): string {
  let ms = Date.now();
  if (previous !== undefined) {
    const prevMs = Date.parse(previous);
    if (!Number.isNaN(prevMs) && ms <= prevMs) {
      ms = prevMs + 1;
    }
  }
  return new Date(ms).toISOString();
}

export function isMemoryId(value: string): boolean {
  return MemoryIdSchema.safeParse(value).success;
}

/** Validates caller input and turns it into a complete record. */
export function createMemoryRecord(input: MemoryInput): MemoryRecord {
  const parsed = MemoryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid memory input", {
      issues: formatIssues(parsed.error),
      cause: parsed.error,
    });
  }

  const value = parsed.data;
  if (typeof value === "string") {
    const now = nextTimestamp();
    return {
      id: randomUUID(),
      text: value,
      metadata: { source: "conversation", createdAt: now, updatedAt: now, extra: {} },
    };
  }

  const meta = value.metadata ?? {};
  const createdAt = meta.createdAt ?? nextTimestamp();
  const metadata: MemoryMetadata = {
    source: meta.source ?? "conversation",
    createdAt,
    updatedAt: meta.updatedAt ?? createdAt,
    extra: { ...meta.extra },
  };
  if (meta.type !== undefined) metadata.type = meta.type;
  if (meta.tags !== undefined) metadata.tags = [...meta.tags];

  return { id: value.id ?? randomUUID(), text: value.text, metadata };
}

/**
 * Builds the record that replaces `existing`: new text and metadata, the
 * original creation time, and a fresh update time.
 */
export function applyUpdate(
  existing: MemoryRecord,
  replacement: MemoryRecord,
): MemoryRecord {
  return {
    id: existing.id,
    text: replacement.text,
    metadata: {
      ...replacement.metadata,
      createdAt: existing.metadata.createdAt,
      updatedAt: nextTimestamp(existing.metadata.updatedAt),
    },
  };
}

export function toStoredMetadata(metadata: MemoryMetadata): StoredMemoryMetadata {
  const stored: StoredMemoryMetadata = {
    created_at: metadata.createdAt,
    updated_at: metadata.updatedAt,
  };
  for (const [key, value] of Object.entries(metadata.extra)) {
    if (!KNOWN_STORED_KEYS.has(key)) stored[key] = value;
  }
  if (metadata.type !== undefined) stored.type = metadata.type;
  if (metadata.source !== undefined) stored.source = metadata.source;
  if (metadata.tags !== undefined) stored.tags = [...metadata.tags];
  return stored;
}

export function toStoredRecord(record: MemoryRecord): StoredMemoryRecord {
  return {
    id: record.id,
    text: record.text,
    metadata: toStoredMetadata(record.metadata),
  };
}

export function fromStoredRecord(stored: StoredMemoryRecord): MemoryRecord {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(stored.metadata)) {
    if (!KNOWN_STORED_KEYS.has(key)) extra[key] = value;
  }

  const metadata: MemoryMetadata = {
    createdAt: stored.metadata.created_at,
    updatedAt: stored.metadata.updated_at,
    extra,
  };
  if (stored.metadata.type !== undefined) metadata.type = stored.metadata.type;
  if (stored.metadata.source !== undefined) metadata.source = stored.metadata.source;
  if (stored.metadata.tags !== undefined) metadata.tags = [...stored.metadata.tags];

  return { id: stored.id, text: stored.text, metadata };
}

/**
 * Parses an untrusted stored record (snapshot entry or vector-store payload).
 * Returns the zod error instead of throwing so callers can wrap it.
 */
export function parseStoredRecord(
  value: unknown,
): { success: true; record: MemoryRecord } | { success: false; error: z.ZodError } {
  const parsed = StoredMemoryRecordSchema.safeParse(value);
  if (!parsed.success) return { success: false, error: parsed.error };
  return { success: true, record: fromStoredRecord(parsed.data) };
}

export function cloneRecord(record: MemoryRecord): MemoryRecord {
  return structuredClone(record);
}
