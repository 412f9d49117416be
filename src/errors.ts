export class MemkitError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "MemkitError";
  }
}

export class ValidationError extends MemkitError {
  readonly issues: string[];

  constructor(message: string, options?: { issues?: string[]; cause?: Error }) {
    super(message, { cause: options?.cause });
    this.name = "ValidationError";
    this.issues = options?.issues ?? [];
  }
}

export class ConfigurationError extends MemkitError {
  readonly issues: string[];

  constructor(message: string, options?: { issues?: string[]; cause?: Error }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.issues = options?.issues ?? [];
  }
}

export type BackendDependency = "embedder" | "vector_store";

export class BackendUnavailableError extends MemkitError {
  readonly dependency: BackendDependency;

  constructor(
    message: string,
    options: { dependency: BackendDependency; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "BackendUnavailableError";
    this.dependency = options.dependency;
  }
}

export class EmbeddingApiError extends MemkitError {
  readonly statusCode?: number;
  readonly provider: string;

  constructor(
    message: string,
    options: { provider: string; statusCode?: number; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "EmbeddingApiError";
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

export class VectorStoreError extends MemkitError {
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: Error }) {
    super(message, { cause: options?.cause });
    this.name = "VectorStoreError";
    this.statusCode = options?.statusCode;
  }
}

export class SnapshotError extends MemkitError {
  readonly path: string;
  readonly issues: string[];

  constructor(
    message: string,
    options: { path: string; issues?: string[]; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "SnapshotError";
    this.path = options.path;
    this.issues = options.issues ?? [];
  }
}

export class UnsupportedSnapshotFormatError extends SnapshotError {
  readonly expected: string;
  readonly found: string;

  constructor(
    message: string,
    options: { path: string; expected: string; found: string },
  ) {
    super(message, { path: options.path });
    this.name = "UnsupportedSnapshotFormatError";
    this.expected = options.expected;
    this.found = options.found;
  }
}

export function toError(value: unknown): Error | undefined {
  return value instanceof Error ? value : undefined;
}

/** Reads the HTTP status that API client errors expose as `status`. */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
}
