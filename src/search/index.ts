/**
 * Runs one role against every enabled provider and location, and merges the
 * results. Locations form the outer loop and providers the inner one, in
 * registry order; the first copy of a link wins.
 */

import type { Logger } from "../logger";
import { ConfigurationError, errorMessage } from "../errors";
import type { ProviderRegistry } from "../providers";
import type { Posting, ProviderPosting, SearchFilters } from "../types";

const REQUIRED_PROVIDER_SETTINGS = ["module", "resultLimit"] as const;

export function assertProviderSettings(registry: ProviderRegistry): void {
  for (const { name, settings } of registry.values()) {
    if (!settings.enabled) continue;
    for (const key of REQUIRED_PROVIDER_SETTINGS) {
      if (settings[key] === undefined) {
        throw new ConfigurationError(
          `Provider '${name}' missing required setting '${key}'`,
        );
      }
    }
  }
}

function fillDefaults(
  item: ProviderPosting,
  providerName: string,
  label: string,
  location: string,
): Posting {
  const metadata = { ...item.metadata };
  if (!("location" in metadata)) {
    metadata.location = location;
  }
  return {
    ...item,
    title: item.title ?? "",
    source: item.source || label || providerName,
    provider: item.provider || providerName,
    metadata,
  };
}

export async function searchJobsForRole(
  registry: ProviderRegistry,
  role: string,
  locations: readonly string[],
  filters: SearchFilters,
  logger: Logger,
): Promise<Posting[]> {
  assertProviderSettings(registry);

  const aggregated: Posting[] = [];
  const seenLinks = new Set<string>();

  for (const location of locations) {
    for (const { name, settings, provider } of registry.values()) {
      if (!settings.enabled) continue;
      const limit = settings.resultLimit ?? 0;

      let results: ProviderPosting[];
      try {
        results = await provider.search(role, location, limit, filters);
      } catch (error) {
        logger.warn(`Provider ${name} failed: ${errorMessage(error)}`);
        continue;
      }

      let kept = 0;
      for (const item of results) {
        const link = item.link;
        if (!link || seenLinks.has(link)) continue;
        seenLinks.add(link);
        aggregated.push(fillDefaults(item, name, settings.label, location));
        kept++;
      }

      logger.debug(
        `${name} @ ${location}: ${results.length} results, ${kept} new`,
      );
    }
  }

  logger.info(
    `Search "${role}": ${aggregated.length} unique postings across ${locations.length} location(s)`,
  );
  return aggregated;
}
