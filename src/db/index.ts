/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/companyRecordsRepo";
export * from "./repos/rawArtifactsRepo";
export * from "./repos/aggregationRunsRepo";
export * from "./repos/sourceSessionsRepo";
