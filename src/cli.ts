import { createInterface } from "readline/promises";
import { createLogger, type Logger } from "./logger";
import {
  loadConfig,
  logConfigSummary,
  parseLocations,
  validateConfig,
  type AppConfig,
} from "./config";
import { ConfigurationError, errorMessage } from "./errors";
import { buildProviderRegistry } from "./providers";
import { assertProviderSettings } from "./search";
import { createEnricher } from "./ai";
import { createNotifier } from "./alerts";
import { loadRoles } from "./roles";
import { runPipeline, type PipelineRequest } from "./pipeline";
import { minutesToCron, startScheduler, type Scheduler } from "./scheduler";
import { GoogleSheetBackend } from "./storage/google-sheet";
import { ENRICHMENT_KEYS, SheetsRepository } from "./storage/sheets-repository";
import type { DatePosted, JobType, SearchFilters } from "./types";

export const USAGE = [
  "Usage: job-sheet-sync [options]",
  "",
  "  -y, --non-interactive   use configured locations and no filters",
  "  --every <minutes>       repeat the run on a schedule",
  "  -h, --help              show this message",
].join("\n");

export interface CliArgs {
  nonInteractive: boolean;
  everyMinutes: number | null;
  help: boolean;
}

function parseMinutes(raw: string | undefined): number {
  const value = (raw ?? "").trim();
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new ConfigurationError(
      `--every expects a positive whole number of minutes, got "${raw ?? ""}"`,
    );
  }
  return Number.parseInt(value, 10);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { nonInteractive: false, everyMinutes: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--non-interactive" || arg === "-y") {
      args.nonInteractive = true;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--every") {
      args.everyMinutes = parseMinutes(argv[i + 1]);
      i++;
    } else if (arg.startsWith("--every=")) {
      args.everyMinutes = parseMinutes(arg.slice("--every=".length));
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createReadlinePrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}

export const DATE_POSTED_CHOICES: Record<string, DatePosted> = {
  any: "any",
  "24h": "past_24_hours",
  week: "past_week",
  month: "past_month",
};

export const JOB_TYPE_CHOICES: readonly JobType[] = [
  "any",
  "full-time",
  "part-time",
  "contract",
  "internship",
];

async function askChoice<T>(
  prompter: Prompter,
  question: string,
  choices: Record<string, T>,
  fallback: T,
): Promise<T> {
  const options = Object.keys(choices).join("/");
  for (;;) {
    const answer = (await prompter.ask(`${question} [${options}] (any): `))
      .trim()
      .toLowerCase();
    if (!answer) return fallback;
    if (Object.prototype.hasOwnProperty.call(choices, answer)) {
      return choices[answer];
    }
    console.log(`Please answer one of: ${options}`);
  }
}

export async function promptSearchRequest(
  prompter: Prompter,
  defaultLocations: readonly string[],
): Promise<{ locations: string[]; filters: SearchFilters }> {
  const locationAnswer = await prompter.ask(
    `Locations, comma separated (${defaultLocations.join(", ")}): `,
  );
  const locations = parseLocations(locationAnswer);

  const datePosted = await askChoice(
    prompter,
    "Date posted",
    DATE_POSTED_CHOICES,
    "any",
  );
  const jobType = await askChoice(
    prompter,
    "Job type",
    Object.fromEntries(JOB_TYPE_CHOICES.map((t) => [t, t])),
    "any",
  );
  const keywords = (await prompter.ask("Keywords (optional): ")).trim();

  const filters: SearchFilters = {};
  if (datePosted !== "any") filters.datePosted = datePosted;
  if (jobType !== "any") filters.jobType = jobType;
  if (keywords) filters.keywords = keywords;

  return {
    locations: locations.length > 0 ? locations : [...defaultLocations],
    filters,
  };
}

async function buildRequest(
  args: CliArgs,
  config: AppConfig,
  roles: string[],
): Promise<PipelineRequest> {
  if (args.nonInteractive) {
    return { roles, locations: config.search.locations, filters: {} };
  }

  const prompter = createReadlinePrompter();
  try {
    const answers = await promptSearchRequest(prompter, config.search.locations);
    return { roles, ...answers };
  } finally {
    prompter.close();
  }
}

function createRunner(
  config: AppConfig,
  logger: Logger,
  request: PipelineRequest,
): () => Promise<void> {
  const registry = buildProviderRegistry(config.providers, logger);
  assertProviderSettings(registry);
  const enricher = createEnricher({ config: config.ai, logger });
  const notifier = createNotifier(config.alerts, logger);
  const backend = GoogleSheetBackend.fromConfig(config.sheet);

  return async () => {
    const repository = await SheetsRepository.open(backend, {
      logger,
      initialKeys: config.ai.enabled ? ENRICHMENT_KEYS : [],
    });
    const result = await runPipeline(
      {
        registry,
        repository,
        enricher,
        notifier,
        logger,
        settings: {
          maxResultsPerRole: config.search.maxResultsPerRole,
          alertsEnabled: config.ai.alertsEnabled,
          alertThreshold: config.ai.alertThreshold,
        },
      },
      request,
    );

    logger.info("═══════════════════════════════════════════════════");
    logger.info("  Run Complete");
    logger.info("═══════════════════════════════════════════════════");
    logger.info(`  Roles:        ${result.rolesProcessed}`);
    logger.info(`  Postings:     ${result.postingsFound}`);
    logger.info(`  Created:      ${result.created}`);
    logger.info(`  Updated:      ${result.updated}`);
    logger.info(`  Enriched:     ${result.enriched} (${result.enrichmentFailures} failed)`);
    logger.info(`  Alerts:       ${result.alertsSent}`);
    logger.info(`  Errors:       ${result.errors.length}`);
    logger.info(`  Duration:     ${(result.durationMs / 1000).toFixed(1)}s`);
  };
}

/** Returns the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  let config: AppConfig;
  try {
    args = parseCliArgs(argv);
    config = loadConfig();
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger({ level: config.log.level, logFile: config.log.file });
  logger.info("═══════════════════════════════════════════════════");
  logger.info("  Job Sheet Sync");
  logger.info("═══════════════════════════════════════════════════");

  let run: () => Promise<void>;
  try {
    validateConfig(config);
    if (args.everyMinutes !== null) minutesToCron(args.everyMinutes);
    logConfigSummary(config, logger);
    const roles = loadRoles(config.search.rolesFile);
    if (roles.length === 0) {
      throw new ConfigurationError(`No roles found in ${config.search.rolesFile}`);
    }
    const request = await buildRequest(args, config, roles);
    run = createRunner(config, logger, request);
  } catch (error) {
    logger.error(`Startup failed: ${errorMessage(error)}`);
    return 1;
  }

  if (args.everyMinutes === null) {
    try {
      await run();
      return 0;
    } catch (error) {
      logger.error(`Run failed: ${errorMessage(error)}`);
      return 1;
    }
  }

  const scheduler: Scheduler = startScheduler({
    everyMinutes: args.everyMinutes,
    run,
    logger,
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received — finishing up`);
    scheduler.stop().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await scheduler.trigger("startup");
  await scheduler.done;
  return 0;
}
