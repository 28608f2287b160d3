export type BenchmarkErrorCode =
  | "CONFIG"
  | "MALFORMED_SNAPSHOT"
  | "STORAGE"
  | "WAREHOUSE";

export class BenchmarkError extends Error {
  readonly code: BenchmarkErrorCode;

  constructor(code: BenchmarkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends BenchmarkError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [], options?: { cause?: unknown }) {
    super("CONFIG", errors.length > 0 ? `${message}: ${errors.join("; ")}` : message, options);
    this.errors = errors;
  }
}

/**
 * Upstream data contract violation: a metric value that is present but not a
 * number, or a metric container that is not an object.
 */
export class MalformedSnapshotError extends BenchmarkError {
  readonly path: string;
  readonly received: string;

  constructor(path: string, expected: "number" | "object", received: unknown) {
    const kind = received === null ? "null" : Array.isArray(received) ? "array" : typeof received;
    super("MALFORMED_SNAPSHOT", `Malformed snapshot at ${path}: expected ${expected}, received ${kind}`);
    this.path = path;
    this.received = kind;
  }
}

export class StorageError extends BenchmarkError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super("STORAGE", message, { cause });
    this.filePath = filePath;
  }
}

export class WarehouseError extends BenchmarkError {
  constructor(message: string, cause?: unknown) {
    super("WAREHOUSE", message, { cause });
  }
}
