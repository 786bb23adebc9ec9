/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./classification";
export * from "./requirements";
export * from "./ingestion";
export * from "./runner";
export * from "./sources";
export * from "./clients/http";
export * from "./clients/greenhouse";
export * from "./clients/lever";
