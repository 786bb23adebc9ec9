/**
 * Utils barrel exports
 */

export * from "./dbErrors";
export * from "./payloadGuards";
export * from "./text/keywordMatching";
export * from "./text/htmlToText";
