export * from "./logger";
export * from "./postings";
export * from "./db";
export * from "./classification";
export * from "./requirements";
export * from "./ingestion";
export * from "./runner";
export * from "./notifications";
export * from "./sources";
export * from "./clients/http";
// Greenhouse and Lever payload types are NOT exported from the global barrel.
// Import them from "@/types/clients/<provider>" inside src/sources/ only.
