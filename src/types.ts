export type DatePosted = "any" | "past_24_hours" | "past_week" | "past_month";

export type JobType =
  | "any"
  | "full-time"
  | "part-time"
  | "contract"
  | "internship";

export interface SearchFilters {
  datePosted?: DatePosted;
  jobType?: JobType;
  keywords?: string;
}

/** One listing as returned by a provider, before the aggregator fills defaults. */
export interface ProviderPosting {
  title: string;
  link: string;
  source?: string;
  provider?: string;
  company?: string;
  location?: string;
  description?: string;
  metadata?: Record<string, string>;
}

export interface Posting {
  title: string;
  link: string;
  source: string;
  provider: string;
  company?: string;
  location?: string;
  description?: string;
  metadata: Record<string, string>;
}

export interface Provider {
  search(
    role: string,
    location: string,
    limit: number,
    filters: SearchFilters,
  ): Promise<ProviderPosting[]>;
}

export type EnrichmentValue = string | number;

export type Enrichment = Record<string, EnrichmentValue>;

export interface PipelineRunResult {
  rolesProcessed: number;
  postingsFound: number;
  created: number;
  updated: number;
  enriched: number;
  enrichmentFailures: number;
  alertsSent: number;
  errors: string[];
  durationMs: number;
}
