/**
 * Source adapter registry
 */

import type { SourceAdapter } from "@/interfaces";
import type { SourceId } from "@/types";
import type { AdapterOptions } from "./shared";
import { createHandelsregisterAdapter } from "./handelsregister/handelsregisterAdapter";
import { createLinkedinAdapter } from "./linkedin/linkedinAdapter";
import { createNorthdataAdapter } from "./northdata/northdataAdapter";
import { createUnternehmensregisterAdapter } from "./unternehmensregister/unternehmensregisterAdapter";

/**
 * One adapter per source, sharing transport and clock
 */
export function createDefaultAdapters(options: AdapterOptions = {}): Record<SourceId, SourceAdapter> {
  return {
    handelsregister: createHandelsregisterAdapter(options),
    northdata: createNorthdataAdapter(options),
    linkedin: createLinkedinAdapter(options),
    unternehmensregister: createUnternehmensregisterAdapter(options),
  };
}

export {
  createHandelsregisterAdapter,
  createLinkedinAdapter,
  createNorthdataAdapter,
  createUnternehmensregisterAdapter,
};
export { classifyHttpError, classifyThrown, inspectPage } from "./shared";
export type { AdapterOptions } from "./shared";
