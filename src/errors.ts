// src/errors.ts

/** A filesystem operation failed (open, read, stat, walk or unlink). */
export class IOError extends Error {
  override readonly cause?: unknown;
  readonly code?: string;

  constructor(
    message: string,
    public readonly op: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "IOError";
    this.cause = options?.cause;
    this.code = errnoCode(options?.cause);
  }

  static wrap(op: string, path: string, err: unknown): IOError {
    if (err instanceof IOError) return err;
    return new IOError(
      `${op} failed for '${path}': ${errorMessage(err)}`,
      op,
      path,
      { cause: err },
    );
  }
}

/** The index database rejected an operation. */
export class StorageError extends Error {
  override readonly cause?: unknown;

  constructor(
    public readonly operation: string,
    options?: { cause?: unknown; message?: string },
  ) {
    super(
      options?.message ??
        `${operation} failed: ${errorMessage(options?.cause)}`,
    );
    this.name = "StorageError";
    this.cause = options?.cause;
  }
}

export class InvalidSelection extends Error {
  constructor(
    message: string,
    public readonly choice: unknown,
    public readonly groupSize: number,
  ) {
    super(message);
    this.name = "InvalidSelection";
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
