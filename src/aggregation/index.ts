export { aggregate } from "./orchestrator";
export type { AggregateDeps, IdentityInput } from "./orchestrator";
export { runPipeline, isRetryable, computeBackoff, missingIdentityFields } from "./retryController";
export type { PipelineDeps } from "./retryController";
export { PipelineTracker } from "./pipelineTracker";
export type { PipelineOutcome } from "./pipelineTracker";
export { mergePartials, priorityFor, tierOf } from "./mergePartials";
export type { MergeInput, MergeOutput } from "./mergePartials";
export { loadKnownCompanies, enrichIdentity } from "./knownCompanies";
export { mapSources } from "./sourceMap";
export { aggregateBatch, loadIdentities } from "./batch";
export type { BatchEntry } from "./batch";
