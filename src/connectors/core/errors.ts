/**
 * Typed failures raised along the archive pipeline.
 *
 * The archiver decides between aborting the run and isolating a single
 * message by looking at `kind`, so every failure site throws its own class
 * and keeps the underlying error as `cause`.
 */

export type ErrorKind =
  | "validation"
  | "configuration"
  | "auth"
  | "list"
  | "fetch"
  | "decode"
  | "write";

export abstract class ArchiverError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Run-level (fatal) ───

/** The request is missing a required field. Maps to a 400. */
export class ValidationError extends ArchiverError {
  readonly kind = "validation" as const;
}

/** Required configuration (secrets, bucket) is absent. */
export class ConfigurationError extends ArchiverError {
  readonly kind = "configuration" as const;
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class AuthError extends ArchiverError {
  readonly kind = "auth" as const;
}

export class ListError extends ArchiverError {
  readonly kind = "list" as const;
}

// ─── Per-message (isolated) ───

export class FetchError extends ArchiverError {
  readonly kind = "fetch" as const;
  readonly messageId: string;

  constructor(messageId: string, options?: { cause?: unknown }) {
    super(
      `Failed to fetch message ${messageId}: ${describeError(options?.cause)}`,
      options,
    );
    this.messageId = messageId;
  }
}

export class DecodeError extends ArchiverError {
  readonly kind = "decode" as const;
}

export class WriteError extends ArchiverError {
  readonly kind = "write" as const;
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super(`Failed to write ${key}: ${describeError(options?.cause)}`, options);
    this.key = key;
  }
}

// ─── Helpers ───

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "unknown error";
  return String(err);
}
