/**
 * Source collaborators public surface
 */

export {
  createSourceRegistry,
  createDefaultSourceRegistry,
  UnknownSourceTypeError,
  BUILT_IN_SOURCE_FACTORIES,
} from "./registry";
export type { SourceFactory, SourceRegistry } from "./registry";
export { createPoliteFetcher, randomDelayMs } from "./politeFetch";
export type { PoliteFetcher } from "./politeFetch";
export { GreenhouseSource, createGreenhouseSource } from "./greenhouse/greenhouseSource";
export { LeverSource, createLeverSource } from "./lever/leverSource";
