/**
 * Shared zod schemas for values read from files and database columns
 */

import { z } from "zod";
import { FAILURE_KINDS } from "@/constants/failureKinds";

export const sourceIdSchema = z.enum([
  "handelsregister",
  "northdata",
  "linkedin",
  "unternehmensregister",
]);

export const failureKindSchema = z.enum(FAILURE_KINDS);

export const priorityOrderSchema = z.array(
  z.union([sourceIdSchema, z.array(sourceIdSchema).min(1)]),
);

export const fieldProvenanceSchema = z.object({
  source: z.union([sourceIdSchema, z.literal("request")]),
  fetchedAt: z.string(),
});

export const stringListSchema = z.array(z.string());
