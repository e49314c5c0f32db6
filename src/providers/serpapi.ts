import type { Logger } from "../logger";
import { fetchJson } from "./base";

export const SERPAPI_ENDPOINT = "https://serpapi.com/search.json";

export interface SerpApiParams {
  engine: string;
  q: string;
  num?: number;
  tbs?: string;
}

export interface SerpApiOrganicResult {
  position?: number;
  title?: string;
  link?: string;
  displayed_link?: string;
  snippet?: string;
  date?: string;
}

export interface SerpApiResult {
  error?: string;
  organic_results: SerpApiOrganicResult[];
}

export interface SerpApiClientOptions {
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: typeof fetch;
}

export function buildSerpApiUrl(params: SerpApiParams, apiKey: string): string {
  const url = new URL(SERPAPI_ENDPOINT);
  for (const [k, v] of Object.entries(params)) {
    if (v === undefined) continue;
    url.searchParams.set(k, String(v));
  }
  url.searchParams.set("api_key", apiKey);
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function parseSerpApiResult(data: unknown): SerpApiResult {
  if (!isRecord(data)) {
    throw new Error("SerpApi response is not a JSON object");
  }
  const rawResults = Array.isArray(data.organic_results)
    ? data.organic_results
    : [];

  const organic_results = rawResults.filter(isRecord).map((item) => ({
    position: typeof item.position === "number" ? item.position : undefined,
    title: readString(item.title),
    link: readString(item.link),
    displayed_link: readString(item.displayed_link),
    snippet: readString(item.snippet),
    date: readString(item.date),
  }));

  return {
    error: data.error === undefined ? undefined : String(data.error),
    organic_results,
  };
}

export async function serpApiSearch(
  params: SerpApiParams,
  options: SerpApiClientOptions,
): Promise<SerpApiResult> {
  const { apiKey, timeoutMs, logger, fetchFn } = options;
  const keySuffix = apiKey.slice(-4);

  logger.debug(`SerpApi: searching "${params.q}" with key ...${keySuffix}`);

  const data = await fetchJson({
    url: buildSerpApiUrl(params, apiKey),
    timeoutMs,
    fetchFn,
  });
  const result = parseSerpApiResult(data);

  // "no results" comes back as an error string with an empty result list
  if (result.error && !/hasn't returned any results/i.test(result.error)) {
    throw new Error(`SerpApi error: ${result.error}`);
  }
  return result;
}
