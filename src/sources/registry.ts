/**
 * Source registry: source-type tag -> collaborator
 *
 * Populated explicitly at start-up; an owner whose source_type has no
 * entry fails its crawl with UnknownSourceTypeError.
 */

import type { SourceFactoryDeps } from "@/types";
import type { SourceCollaborator } from "@/interfaces";
import { createGreenhouseSource } from "./greenhouse/greenhouseSource";
import { createLeverSource } from "./lever/leverSource";

export type SourceFactory = (deps: SourceFactoryDeps) => SourceCollaborator;

export class UnknownSourceTypeError extends Error {
  constructor(public readonly sourceType: string) {
    super(`Unknown source type: "${sourceType}"`);
    this.name = "UnknownSourceTypeError";
  }
}

export interface SourceRegistry {
  /**
   * @throws {UnknownSourceTypeError} If no collaborator is registered for the tag
   */
  get(sourceType: string): SourceCollaborator;
  has(sourceType: string): boolean;
  sourceTypes(): string[];
}

/**
 * Build every collaborator once from its factory
 */
export function createSourceRegistry(
  factories: Readonly<Record<string, SourceFactory>>,
  deps: SourceFactoryDeps = {},
): SourceRegistry {
  const collaborators = new Map<string, SourceCollaborator>();
  for (const [sourceType, factory] of Object.entries(factories)) {
    collaborators.set(sourceType, factory(deps));
  }

  return {
    get(sourceType: string): SourceCollaborator {
      const collaborator = collaborators.get(sourceType);
      if (!collaborator) {
        throw new UnknownSourceTypeError(sourceType);
      }
      return collaborator;
    },
    has(sourceType: string): boolean {
      return collaborators.has(sourceType);
    },
    sourceTypes(): string[] {
      return [...collaborators.keys()];
    },
  };
}

export const BUILT_IN_SOURCE_FACTORIES: Readonly<Record<string, SourceFactory>> = {
  greenhouse: createGreenhouseSource,
  lever: createLeverSource,
};

export function createDefaultSourceRegistry(deps: SourceFactoryDeps = {}): SourceRegistry {
  return createSourceRegistry(BUILT_IN_SOURCE_FACTORIES, deps);
}
