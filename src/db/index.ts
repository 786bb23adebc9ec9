/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/ownersRepo";
export * from "./repos/postingsRepo";
export * from "./repos/crawlRunsRepo";
