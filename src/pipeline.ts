import type { Logger } from "./logger";
import { EnrichmentError, errorMessage } from "./errors";
import { searchJobsForRole } from "./search";
import { parseFitScore, type Notifier } from "./alerts";
import type { Enricher } from "./ai";
import type { ProviderRegistry } from "./providers";
import type { UpsertJobInput } from "./storage/types";
import type {
  Enrichment,
  PipelineRunResult,
  Posting,
  SearchFilters,
} from "./types";

/** The slice of the sheet repository the pipeline writes through. */
export interface JobRepository {
  upsert(input: UpsertJobInput): Promise<boolean>;
  hasLink(link: string): boolean;
}

export interface PipelineDeps {
  registry: ProviderRegistry;
  repository: JobRepository;
  enricher: Enricher;
  notifier: Notifier;
  logger: Logger;
  settings: {
    maxResultsPerRole: number;
    alertsEnabled: boolean;
    alertThreshold: number;
  };
  now?: () => Date;
}

export interface PipelineRequest {
  roles: readonly string[];
  locations: readonly string[];
  filters: SearchFilters;
}

/** ISO-8601 UTC to the second, e.g. `2024-01-01T00:00:00Z`. */
export function formatFetchedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export async function runPipeline(
  deps: PipelineDeps,
  request: PipelineRequest,
): Promise<PipelineRunResult> {
  const { registry, repository, enricher, notifier, logger, settings } = deps;
  const now = deps.now ?? (() => new Date());
  const startTime = Date.now();

  const result: PipelineRunResult = {
    rolesProcessed: 0,
    postingsFound: 0,
    created: 0,
    updated: 0,
    enriched: 0,
    enrichmentFailures: 0,
    alertsSent: 0,
    errors: [],
    durationMs: 0,
  };

  logger.info("═══════════════════════════════════════════════════");
  logger.info(
    `  Pipeline Run: ${request.roles.length} role(s) × ${request.locations.length} location(s)`,
  );
  logger.info("═══════════════════════════════════════════════════");

  for (const role of request.roles) {
    const postings = await searchJobsForRole(
      registry,
      role,
      request.locations,
      request.filters,
      logger,
    );
    result.postingsFound += postings.length;

    let written = 0;
    let created = 0;
    for (const posting of postings) {
      if (written >= settings.maxResultsPerRole) break;

      const enrichment = await enrichSafely(enricher, posting, logger, result);

      try {
        const isNew = await repository.upsert({
          fetchedAt: formatFetchedAt(now()),
          role,
          title: posting.title,
          source: posting.source,
          link: posting.link,
          metadata: posting.metadata,
          enrichment,
        });
        written++;
        if (isNew) {
          created++;
          result.created++;
        } else {
          result.updated++;
        }
      } catch (error) {
        const msg = `Failed to save ${posting.link || "(no link)"}: ${errorMessage(error)}`;
        logger.error(msg);
        result.errors.push(msg);
        continue;
      }

      if (enrichment && settings.alertsEnabled) {
        const score = parseFitScore(enrichment);
        if (score !== null && score >= settings.alertThreshold) {
          const sent = await notifier.sendHighScoreAlert({ score, posting, enrichment });
          if (sent) result.alertsSent++;
        }
      }
    }

    result.rolesProcessed++;
    logger.info(
      `Processed role: ${role} (added ${created}, updated ${written - created})`,
    );
  }

  result.durationMs = Date.now() - startTime;
  return result;
}

async function enrichSafely(
  enricher: Enricher,
  posting: Posting,
  logger: Logger,
  result: PipelineRunResult,
): Promise<Enrichment | undefined> {
  if (!enricher.enabled) return undefined;

  try {
    const enrichment = await enricher.enrich(posting);
    result.enriched++;
    return enrichment;
  } catch (error) {
    if (!(error instanceof EnrichmentError)) throw error;
    result.enrichmentFailures++;
    logger.warn(
      `AI enrichment skipped for ${posting.link}: ${error.message}`,
    );
    return undefined;
  }
}
