/**
 * Failure taxonomy constants
 */

import type { FailureKind } from "@/types";

export const FAILURE_KINDS = [
  "Timeout",
  "RateLimited",
  "TransientNetwork",
  "AuthExpired",
  "RecordNotFound",
  "MalformedResponse",
  "InvalidIdentity",
] as const satisfies readonly FailureKind[];

/**
 * Kinds that may succeed on a later attempt
 */
export const DEFAULT_RETRYABLE_KINDS: readonly FailureKind[] = [
  "Timeout",
  "RateLimited",
  "TransientNetwork",
] as const;

/**
 * Kinds that end a pipeline on first occurrence
 * - AuthExpired needs an out-of-band re-login
 * - RecordNotFound is an answer, not an error
 */
export const DEFAULT_NON_RETRYABLE_KINDS: readonly FailureKind[] = [
  "AuthExpired",
  "RecordNotFound",
  "MalformedResponse",
  "InvalidIdentity",
] as const;

/**
 * Failure kinds that are never retried, whatever the policy lists
 */
export const NEVER_RETRIED_KINDS: readonly FailureKind[] = [
  "AuthExpired",
  "RecordNotFound",
  "InvalidIdentity",
];
