/**
 * Source Adapter Interface
 *
 * Behavioral contract for the external data sources queried by an
 * aggregation run. Adapters own all site-specific navigation and must
 * classify every failure into the closed FailureKind taxonomy instead of
 * leaking their own error types.
 */

import type {
  AdapterContext,
  DocumentFormat,
  FetchOutcome,
  IdentityRequirement,
  SourceId,
} from "@/types";

export interface SourceAdapter {
  /**
   * Unique identifier of the source
   */
  readonly id: SourceId;

  /**
   * Formats of the documents this adapter returns
   */
  readonly formats: readonly DocumentFormat[];

  /**
   * Capability flag: the adapter needs a valid stored session.
   * The retry controller gates on this flag, never on the adapter id.
   */
  readonly requiresSession: boolean;

  /**
   * Identity fields that must be non-empty for the adapter to run;
   * otherwise the source is reported Skipped
   */
  readonly requiredIdentity: readonly IdentityRequirement[];

  /**
   * Perform one fetch attempt
   *
   * Must observe ctx.signal. May throw: the retry controller classifies
   * anything thrown.
   */
  fetch(ctx: AdapterContext): Promise<FetchOutcome>;
}
