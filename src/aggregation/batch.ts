/**
 * Batch aggregation over a list of identities with a bounded task pool
 *
 * Every submitted identity yields exactly one entry, in input order. A
 * rejected identity does not stop the batch.
 */

import { readFileSync } from "fs";
import pLimit from "p-limit";
import { z } from "zod";
import type { AggregationConfig, AggregationResult } from "@/types";
import { ConfigError, InvalidIdentityError, errorMessage } from "@/errors";
import * as logger from "@/logger";
import { aggregate } from "./orchestrator";
import type { AggregateDeps, IdentityInput } from "./orchestrator";

export type BatchEntry =
  | { input: IdentityInput; ok: true; result: AggregationResult }
  | { input: IdentityInput; ok: false; error: string; invalidIdentity: boolean };

const identityInputSchema = z.object({
  company_name: z.string().optional(),
  registernummer: z.string().optional(),
  ust_idnr: z.string().optional(),
});

/**
 * Read a JSON array of identities
 *
 * @throws {ConfigError} On unreadable or invalid files
 */
export function loadIdentities(path: string): IdentityInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read identities from ${path}`, [errorMessage(err)]);
  }

  const parsed = z.array(identityInputSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid identities file ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export async function aggregateBatch(
  inputs: readonly IdentityInput[],
  config: AggregationConfig,
  deps: AggregateDeps,
  concurrency: number,
): Promise<BatchEntry[]> {
  const limit = pLimit(Math.max(1, concurrency));

  logger.info("Batch started", { identities: inputs.length, concurrency });

  const entries = await Promise.all(
    inputs.map((input) =>
      limit(async (): Promise<BatchEntry> => {
        try {
          const result = await aggregate(input, config, deps);
          return { input, ok: true, result };
        } catch (err) {
          const invalidIdentity = err instanceof InvalidIdentityError;
          logger.warn("Batch identity failed", { input, error: errorMessage(err), invalidIdentity });
          return { input, ok: false, error: errorMessage(err), invalidIdentity };
        }
      }),
    ),
  );

  logger.info("Batch finished", {
    identities: entries.length,
    failed: entries.filter((entry) => !entry.ok).length,
  });
  return entries;
}
