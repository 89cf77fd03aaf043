export * from "./logger";
export * from "./db";
export * from "./company";
export * from "./sources";
export * from "./session";
export * from "./aggregation";
export * from "./clients/http";
export * from "./persistence";
