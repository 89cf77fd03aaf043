/**
 * Domain errors
 *
 * Adapters and parsers never let these escape a pipeline: the retry
 * controller converts them into a classified SourceFailure.
 * StorageError and ConfigError surface to the caller.
 */

import type { FailureKind, SourceFailure } from "@/types";

/**
 * Failure already classified into the closed taxonomy
 * Thrown by adapters/parsers when returning a result union is awkward
 * (deep inside a helper).
 */
export class SourceFailureError extends Error {
  public readonly kind: FailureKind;

  constructor(kind: FailureKind, detail: string) {
    super(detail);
    this.name = "SourceFailureError";
    this.kind = kind;
  }

  toFailure(): SourceFailure {
    return { kind: this.kind, detail: this.message };
  }
}

/**
 * Identity rejected before any source was queried
 */
export class InvalidIdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidIdentityError";
  }
}

/**
 * Persisting the record, artifacts or run history failed
 * The transaction was rolled back; nothing was written.
 */
export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

/**
 * Aggregation configuration could not be loaded or failed validation
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
