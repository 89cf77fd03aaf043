/**
 * Utils barrel exports
 */

export * from "./identity/companyIdentity";
export * from "./text/removeDiacritics";
export * from "./text/germanNumbers";
export * from "./async/sleep";
