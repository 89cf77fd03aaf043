export * from "./classifyFailure";
export * from "./pageLinks";
export * from "./adapterOptions";
