/**
 * Source type definitions
 *
 * Types shared by source adapters, document parsers and the retry controller.
 */

import type {
  ArtifactFieldName,
  CompanyIdentity,
  PartialFieldMap,
} from "./company";
import type { SessionState } from "./session";

/**
 * Independent data sources queried per run
 *
 * - handelsregister: commercial-register lookup (XML + PDF downloads)
 * - northdata: business-data aggregator (HTML detail page)
 * - linkedin: professional network (authenticated about page)
 * - unternehmensregister: official company register (search + annual report)
 */
export type SourceId =
  | "handelsregister"
  | "northdata"
  | "linkedin"
  | "unternehmensregister";

/**
 * Closed failure taxonomy. Adapters and parsers classify every failure
 * into one of these kinds; retry decisions depend on the kind only.
 */
export type FailureKind =
  | "Timeout"
  | "RateLimited"
  | "TransientNetwork"
  | "AuthExpired"
  | "RecordNotFound"
  | "MalformedResponse"
  | "InvalidIdentity";

export type SourceFailure = {
  kind: FailureKind;
  detail: string;
};

export type DocumentFormat = "html" | "pdf" | "xml";

/**
 * One raw document returned by an adapter
 */
export type RawDocument = {
  /** Declared format, used for parser dispatch */
  format: DocumentFormat;
  /** Raw content: text for html/xml, text or bytes for pdf */
  body: string | Buffer;
  /** Canonical field that carries this document's reference */
  artifactField: ArtifactFieldName;
  /** Opaque reference (path/URI), stored verbatim */
  reference: string;
};

export type RawPayload = {
  source: SourceId;
  /** ISO 8601 timestamp of the fetch */
  fetchedAt: string;
  documents: RawDocument[];
};

/**
 * Raw artifact handed to the persistence sink
 */
export type RawArtifact = {
  source: SourceId;
  field: ArtifactFieldName;
  reference: string;
  format: DocumentFormat;
  content: string | Buffer;
};

/**
 * Context passed to an adapter for one fetch attempt
 */
export type AdapterContext = {
  /** Frozen copy of the run identity */
  identity: CompanyIdentity;
  /** Present only for adapters with requiresSession */
  session?: SessionState;
  /** Aborted when the attempt times out or the run deadline fires */
  signal: AbortSignal;
};

export type FetchOutcome =
  | { ok: true; payload: RawPayload }
  | { ok: false; failure: SourceFailure };

export type ParseOutcome =
  | { ok: true; fields: PartialFieldMap }
  | { ok: false; failure: SourceFailure };

/**
 * Identity fields an adapter needs before it can run
 */
export type IdentityRequirement = "company_name" | "registernummer";

export type SourceStatus = "Success" | "PartialSuccess" | "Failed" | "Skipped";

export type AttemptRecord = {
  /** 1-based attempt number */
  attempt: number;
  startedAt: string;
  finishedAt: string;
  outcome: "success" | "failure";
  failureKind?: FailureKind;
  detail?: string;
  /** Backoff slept after this attempt, if retried */
  backoffMs?: number;
};

/**
 * Outcome of one source pipeline within one run
 */
export type SourceResult = {
  source: SourceId;
  status: SourceStatus;
  failureKind?: FailureKind;
  failureDetail?: string;
  fields: PartialFieldMap;
  artifacts: RawArtifact[];
  attempts: AttemptRecord[];
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  /** Fetch timestamp of the payload the fields came from */
  fetchedAt?: string;
};

/**
 * Result of parsing every document in a payload
 */
export type ParsedPayload = {
  fields: PartialFieldMap;
  artifacts: RawArtifact[];
  parsedDocuments: number;
  failures: Array<SourceFailure & { reference: string }>;
};

