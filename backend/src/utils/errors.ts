import type { ValidationField } from "shared/types/index.js";

/**
 * Filesystem read or create failure. `code` carries the errno code
 * reported by node (ENOENT, EACCES, ENOTDIR, ...) when there is one.
 */
export class IoError extends Error {
  readonly code: string | undefined;
  readonly path: string;

  constructor(message: string, path: string, code?: string) {
    super(message);
    this.name = "IoError";
    this.path = path;
    this.code = code;
  }

  static from(err: unknown, path: string): IoError {
    if (err instanceof IoError) return err;
    if (err instanceof Error) {
      const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
      return new IoError(err.message, path, code);
    }
    return new IoError(String(err), path);
  }
}

/** A gated command was attempted while its field is invalid. */
export class ValidationError extends Error {
  readonly field: ValidationField;

  constructor(field: ValidationField, message: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}
