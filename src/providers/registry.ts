/**
 * Provider Registry
 *
 * Name-keyed set of adapters. The planner and coordinator only ever look
 * providers up here, so adding a backend means registering one more
 * adapter.
 */

import type { InferenceProvider, ProviderKind } from "../types/provider.js";
import { UnknownProviderError } from "../types/errors.js";
import { createModalProvider } from "./modal.js";
import { createRunpodProvider, type RunpodProviderOptions } from "./runpod.js";
import { createSkyserveProvider, type SkyserveProviderOptions } from "./skyserve.js";

export interface ProviderRegistry {
  /**
   * Add an adapter, replacing any with the same name
   */
  register(provider: InferenceProvider): void;

  /**
   * @throws UnknownProviderError listing the registered names
   */
  get(name: string): InferenceProvider;

  has(name: string): boolean;

  /** Registered names, sorted */
  list(): string[];

  /** Registered names of one kind, sorted */
  byKind(kind: ProviderKind): string[];
}

export const createProviderRegistry = (
  providers: readonly InferenceProvider[] = []
): ProviderRegistry => {
  const entries = new Map<string, InferenceProvider>();
  for (const provider of providers) {
    entries.set(provider.name, provider);
  }

  const list = (): string[] => [...entries.keys()].sort();

  return {
    register: (provider) => {
      entries.set(provider.name, provider);
    },
    get: (name) => {
      const provider = entries.get(name);
      if (!provider) {
        throw new UnknownProviderError(name, list());
      }
      return provider;
    },
    has: (name) => entries.has(name),
    list,
    byKind: (kind) =>
      list().filter((name) => entries.get(name)?.kind === kind),
  };
};

/**
 * Registry holding the built-in adapters, sharing one set of collaborators
 */
export const createDefaultRegistry = (
  options: RunpodProviderOptions & SkyserveProviderOptions = {}
): ProviderRegistry =>
  createProviderRegistry([
    createModalProvider(options),
    createRunpodProvider(options),
    createSkyserveProvider(options),
  ]);
