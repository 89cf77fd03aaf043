/**
 * Merge of per-source partial field maps into one canonical record
 *
 * Per field the value from the highest-priority tier wins. Within a tier
 * the most recently fetched value wins, then the lowest source id, so the
 * result never depends on completion order. Every differing value that
 * lost is kept as a conflict.
 */

import type {
  CanonicalFieldName,
  CanonicalFieldValue,
  DiscardedValue,
  FieldConflict,
  FieldProvenance,
  MergePriority,
  PartialFieldMap,
  PriorityOrder,
  SourceId,
} from "@/types";
import { CANONICAL_FIELDS } from "@/constants/canonicalFields";

export type MergeInput = {
  source: SourceId;
  fields: PartialFieldMap;
  /** ISO 8601 fetch timestamp of the payload the fields came from */
  fetchedAt: string;
};

export type MergeOutput = {
  fields: PartialFieldMap;
  provenance: Partial<Record<CanonicalFieldName, FieldProvenance>>;
  conflicts: FieldConflict[];
};

type Candidate = MergeInput & { tier: number; value: CanonicalFieldValue };

/**
 * Priority order that applies to a field
 */
export function priorityFor(field: CanonicalFieldName, priority: MergePriority): PriorityOrder {
  return priority.fields[field] ?? priority.default;
}

/**
 * Tier index of a source (0 = highest); unlisted sources rank last
 */
export function tierOf(source: SourceId, order: PriorityOrder): number {
  const index = order.findIndex((tier) =>
    Array.isArray(tier) ? tier.includes(source) : tier === source,
  );
  return index === -1 ? order.length : index;
}

export function valuesEqual(a: CanonicalFieldValue, b: CanonicalFieldValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return a === b;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.tier !== b.tier) return a.tier - b.tier;
  if (a.fetchedAt !== b.fetchedAt) return a.fetchedAt < b.fetchedAt ? 1 : -1;
  return a.source < b.source ? -1 : a.source > b.source ? 1 : 0;
}

function discardReason(loser: Candidate, winner: Candidate): DiscardedValue["reason"] {
  if (loser.tier !== winner.tier) return "lower_priority";
  if (loser.fetchedAt !== winner.fetchedAt) return "older_fetch";
  return "source_order";
}

function copyField<K extends CanonicalFieldName>(
  target: PartialFieldMap,
  source: PartialFieldMap,
  field: K,
): void {
  target[field] = source[field];
}

/**
 * Merge partial field maps under the configured priority
 */
export function mergePartials(inputs: MergeInput[], priority: MergePriority): MergeOutput {
  const output: MergeOutput = { fields: {}, provenance: {}, conflicts: [] };

  for (const field of CANONICAL_FIELDS) {
    const order = priorityFor(field, priority);
    const candidates: Candidate[] = [];

    for (const input of inputs) {
      const value = input.fields[field];
      if (value !== undefined) {
        candidates.push({ ...input, value, tier: tierOf(input.source, order) });
      }
    }
    if (candidates.length === 0) continue;

    candidates.sort(compareCandidates);
    const [winner, ...rest] = candidates;

    copyField(output.fields, winner.fields, field);
    output.provenance[field] = { source: winner.source, fetchedAt: winner.fetchedAt };

    const discarded: DiscardedValue[] = rest
      .filter((candidate) => !valuesEqual(candidate.value, winner.value))
      .map((candidate) => ({
        source: candidate.source,
        value: candidate.value,
        fetchedAt: candidate.fetchedAt,
        reason: discardReason(candidate, winner),
      }));

    if (discarded.length > 0) {
      output.conflicts.push({
        field,
        chosen: { source: winner.source, value: winner.value },
        discarded,
      });
    }
  }

  return output;
}
