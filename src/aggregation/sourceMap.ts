/**
 * Build a record with one entry per source
 */

import type { SourceId } from "@/types";

export function mapSources<T>(build: (source: SourceId) => T): Record<SourceId, T> {
  return {
    handelsregister: build("handelsregister"),
    northdata: build("northdata"),
    linkedin: build("linkedin"),
    unternehmensregister: build("unternehmensregister"),
  };
}
