export * from "./logger";
export * from "./canonicalFields";
export * from "./failureKinds";
export * from "./aggregation";
export * from "./sources";
export * from "./parsers";
export * from "./clients/http";
