import type { Logger } from "../logger";
import type { ProviderSettings } from "../config";
import { ConfigurationError, ProviderError, errorMessage } from "../errors";
import type {
  DatePosted,
  Provider,
  ProviderPosting,
  SearchFilters,
} from "../types";
import {
  serpApiSearch,
  type SerpApiOrganicResult,
  type SerpApiParams,
} from "./serpapi";

const DATE_POSTED_TBS: Record<DatePosted, string | undefined> = {
  any: undefined,
  past_24_hours: "qdr:d",
  past_week: "qdr:w",
  past_month: "qdr:m",
};

export function buildQuery(
  role: string,
  location: string,
  site: string | undefined,
  filters: SearchFilters,
): Pick<SerpApiParams, "q" | "tbs"> {
  const parts = [`${role} in ${location}`];
  if (site) parts.push(`site:${site}`);

  if (filters.jobType && filters.jobType !== "any") {
    parts.push(filters.jobType);
  }
  const keywords = filters.keywords?.trim();
  if (keywords) {
    parts.push(keywords);
  }

  const tbs = filters.datePosted ? DATE_POSTED_TBS[filters.datePosted] : undefined;
  return tbs ? { q: parts.join(" "), tbs } : { q: parts.join(" ") };
}

export function toPosting(
  item: SerpApiOrganicResult,
  label: string,
): ProviderPosting | null {
  if (!item.link) return null;

  const metadata: Record<string, string> = {};
  if (item.date) metadata.posted_at = item.date;
  if (item.snippet) metadata.snippet = item.snippet;
  if (item.displayed_link) metadata.displayed_link = item.displayed_link;
  if (item.position !== undefined) metadata.position = String(item.position);

  return {
    title: item.title ?? "",
    link: item.link,
    source: label,
    metadata,
  };
}

export interface SerpApiJobsProviderOptions {
  name: string;
  settings: ProviderSettings;
  logger: Logger;
  fetchFn?: typeof fetch;
}

/** Google results restricted to one job board through a `site:` filter. */
export function createSerpApiJobsProvider(
  options: SerpApiJobsProviderOptions,
): Provider {
  const { name, settings, logger, fetchFn } = options;

  return {
    async search(role, location, limit, filters) {
      if (!settings.apiKey) {
        throw new ConfigurationError(
          `SerpApi key is not configured for the ${name} provider`,
        );
      }

      const query = buildQuery(role, location, settings.site, filters);
      const params: SerpApiParams = { engine: "google", ...query };
      if (limit > 0) params.num = limit;

      let items: SerpApiOrganicResult[];
      try {
        const result = await logger.timed(
          "serpapi.request",
          { provider: name, role, location },
          () =>
            serpApiSearch(params, {
              apiKey: settings.apiKey,
              timeoutMs: settings.timeoutMs,
              logger,
              fetchFn,
            }),
        );
        items = result.organic_results;
      } catch (error) {
        throw new ProviderError(name, errorMessage(error));
      }

      const postings = items
        .map((item) => toPosting(item, settings.label))
        .filter((posting): posting is ProviderPosting => posting !== null);

      return limit > 0 ? postings.slice(0, limit) : postings;
    },
  };
}
