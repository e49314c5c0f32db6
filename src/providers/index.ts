/**
 * Provider registry: maps each configured provider name to a constructed
 * implementation. Factories are looked up by the `module` field of the
 * provider settings.
 */

import type { Logger } from "../logger";
import type { AppConfig, ProviderSettings } from "../config";
import { ConfigurationError } from "../errors";
import type { Provider } from "../types";
import { createSerpApiJobsProvider } from "./serpapi-jobs";

export interface ProviderFactoryContext {
  name: string;
  settings: ProviderSettings;
  logger: Logger;
  fetchFn?: typeof fetch;
}

export type ProviderFactory = (context: ProviderFactoryContext) => Provider;

export const PROVIDER_FACTORIES: Readonly<Record<string, ProviderFactory>> = {
  "serpapi-jobs": (context) => createSerpApiJobsProvider(context),
};

export interface RegisteredProvider {
  name: string;
  settings: ProviderSettings;
  provider: Provider;
}

/** Iteration order follows the order providers appear in the config. */
export type ProviderRegistry = Map<string, RegisteredProvider>;

export function buildProviderRegistry(
  providers: AppConfig["providers"],
  logger: Logger,
  options: {
    factories?: Readonly<Record<string, ProviderFactory>>;
    fetchFn?: typeof fetch;
  } = {},
): ProviderRegistry {
  const factories = options.factories ?? PROVIDER_FACTORIES;
  const registry: ProviderRegistry = new Map();

  for (const [name, settings] of Object.entries(providers)) {
    if (!settings.enabled) {
      logger.debug(`Provider ${name} disabled — skipping`);
      continue;
    }
    if (!settings.module) {
      throw new ConfigurationError(
        `Provider '${name}' missing required setting 'module'`,
      );
    }

    const factory = factories[settings.module];
    if (!factory) {
      throw new ConfigurationError(
        `Provider '${name}' references unknown module '${settings.module}'`,
      );
    }

    registry.set(name, {
      name,
      settings,
      provider: factory({ name, settings, logger, fetchFn: options.fetchFn }),
    });
  }

  logger.info(
    `Providers ready: ${[...registry.keys()].join(", ") || "none"}`,
  );
  return registry;
}
