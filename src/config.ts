import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { ConfigurationError } from "./errors";
import type { Logger, LogLevel } from "./logger";
import { parseLogLevel } from "./logger";

export interface ProviderSettings {
  enabled: boolean;
  /** Factory name in the provider registry. */
  module?: string;
  resultLimit?: number;
  label: string;
  site?: string;
  apiKey: string;
  timeoutMs: number;
}

export interface PromptTemplates {
  system: string;
  user: string;
  candidateProfile: string;
}

export type AiProviderKind = "openai" | "azure";

export interface AiConfig {
  enabled: boolean;
  provider: AiProviderKind;
  model: string;
  apiKey: string;
  org: string;
  baseUrl: string;
  completionsUrl: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffSeconds: number;
  responseFormatJson: boolean;
  alertsEnabled: boolean;
  alertThreshold: number;
  prompts: PromptTemplates;
}

export interface SheetConfig {
  serviceAccountFile: string;
  spreadsheetId: string;
  tab: string;
}

export interface SearchConfig {
  locations: string[];
  maxResultsPerRole: number;
  rolesFile: string;
}

export interface AlertConfig {
  telegramBotToken: string;
  telegramChatId: string;
  dryRun: boolean;
}

export interface LogConfig {
  level: LogLevel;
  file: string;
}

export interface AppConfig {
  /** Insertion order is the provider iteration order. */
  providers: Record<string, ProviderSettings>;
  search: SearchConfig;
  sheet: SheetConfig;
  ai: AiConfig;
  alerts: AlertConfig;
  log: LogConfig;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configDir?: string;
}

export const DEFAULT_CONFIG_DIR = fileURLToPath(
  new URL("../config", import.meta.url),
);

const DEFAULT_PROVIDER_LIMIT = 10;
const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function parseEnvFloat(
  value: string | undefined,
  fallback: number,
  min?: number,
): number {
  const parsed = Number.parseFloat(value ?? "");
  if (Number.isNaN(parsed)) return fallback;
  if (typeof min === "number" && parsed < min) return min;
  return parsed;
}

export function parseEnvBool(
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/** `serpapi-linkedin` → `SERPAPI_LINKEDIN` */
export function envSegment(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match: string, comment: string | undefined) => (comment ? "" : match),
  );
}

export function loadJsonFile(filepath: string): unknown {
  if (!existsSync(filepath)) {
    throw new ConfigurationError(`Config file not found: ${filepath}`);
  }

  try {
    const raw = readFileSync(filepath, "utf-8");
    const parsed: unknown = JSON.parse(stripJsonComments(raw));
    return parsed;
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file ${filepath}: ${error}`,
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function optionalInt(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

export function parseProviderSettings(
  raw: unknown,
  env: NodeJS.ProcessEnv,
): Record<string, ProviderSettings> {
  const section = isRecord(raw) && isRecord(raw.providers) ? raw.providers : null;
  if (!section) {
    throw new ConfigurationError(
      'providers.json must contain a "providers" object',
    );
  }

  const defaultLimit = parseEnvInt(
    env.DEFAULT_PROVIDER_LIMIT,
    DEFAULT_PROVIDER_LIMIT,
    1,
    100,
  );
  const defaultTimeout = parseEnvInt(
    env.PROVIDER_REQUEST_TIMEOUT_MS,
    DEFAULT_PROVIDER_TIMEOUT_MS,
    1000,
  );

  const providers: Record<string, ProviderSettings> = {};
  for (const [name, entry] of Object.entries(section)) {
    // Object keys like "1" iterate before all others, ahead of file order.
    if (/^(0|[1-9]\d*)$/.test(name)) {
      throw new ConfigurationError(
        `Provider name '${name}' must not be a plain number; numeric names lose their place in the provider order`,
      );
    }
    if (!isRecord(entry)) {
      throw new ConfigurationError(`Provider '${name}' must be an object`);
    }
    const prefix = `PROVIDER_${envSegment(name)}`;

    const fileLimit = optionalInt(entry.resultLimit);
    const envLimit = env[`${prefix}_LIMIT`];
    const resultLimit =
      envLimit !== undefined
        ? parseEnvInt(envLimit, fileLimit ?? defaultLimit, 1, 100)
        : fileLimit;

    const apiKeyEnv = optionalString(entry.apiKeyEnv);
    const apiKey =
      env[`${prefix}_API_KEY`] ||
      (apiKeyEnv ? env[apiKeyEnv] : undefined) ||
      env.SERPAPI_KEY ||
      "";

    providers[name] = {
      enabled: parseEnvBool(
        env[`${prefix}_ENABLED`],
        typeof entry.enabled === "boolean" ? entry.enabled : true,
      ),
      module: optionalString(entry.module),
      resultLimit,
      label: env[`${prefix}_LABEL`] || optionalString(entry.label) || name,
      site: optionalString(entry.site),
      apiKey,
      timeoutMs: optionalInt(entry.timeoutMs) ?? defaultTimeout,
    };
  }
  return providers;
}

/**
 * A value starting with `{` is treated as JSON carrying a `template` field;
 * anything else is used as the template itself.
 */
export function resolvePromptTemplate(
  raw: string | undefined,
  fallback: string,
): string {
  if (!raw) return fallback;
  const value = raw.trim();
  if (!value.startsWith("{")) return value;

  try {
    const data: unknown = JSON.parse(value);
    if (isRecord(data)) {
      return typeof data.template === "string"
        ? data.template
        : fallback;
    }
    return value;
  } catch {
    return value;
  }
}

function parsePromptDefaults(raw: unknown): PromptTemplates {
  const templates = isRecord(raw) ? raw : {};
  const read = (key: string): string => {
    const value = templates[key];
    if (Array.isArray(value)) return value.map((line) => String(line)).join("\n");
    return typeof value === "string" ? value : "";
  };
  return {
    system: read("system"),
    user: read("user"),
    candidateProfile: read("candidateProfile"),
  };
}

function parseAiProvider(value: string | undefined): AiProviderKind {
  return (value ?? "").trim().toLowerCase() === "azure" ? "azure" : "openai";
}

export function parseLocations(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((location) => location.trim())
    .filter((location) => location.length > 0);
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? DEFAULT_CONFIG_DIR;

  const providers = parseProviderSettings(
    loadJsonFile(join(configDir, "providers.json")),
    env,
  );
  const promptDefaults = parsePromptDefaults(
    loadJsonFile(join(configDir, "prompts.json")),
  );

  const locations = parseLocations(env.LOCATION);

  return {
    providers,
    search: {
      locations: locations.length > 0 ? locations : ["Canada"],
      maxResultsPerRole: parseEnvInt(env.MAX_RESULTS_PER_ROLE, 8, 1),
      rolesFile: env.ROLES_FILE || join(configDir, "roles.json"),
    },
    sheet: {
      serviceAccountFile:
        env.GOOGLE_SERVICE_ACCOUNT_JSON ?? "service_account.json",
      spreadsheetId: env.GOOGLE_SHEET_ID ?? "",
      tab: env.GOOGLE_SHEET_TAB || "jobs",
    },
    ai: {
      enabled: parseEnvBool(env.AI_ENRICHMENT_ENABLED, false),
      provider: parseAiProvider(env.AI_PROVIDER),
      model: env.AI_MODEL || "gpt-4o-mini",
      apiKey: env.AI_API_KEY ?? "",
      org: env.AI_ORG ?? "",
      baseUrl: env.AI_BASE_URL || "https://api.openai.com/v1",
      completionsUrl: env.AI_COMPLETIONS_URL ?? "",
      temperature: parseEnvFloat(env.AI_TEMPERATURE, 0.2, 0),
      timeoutMs: parseEnvInt(env.AI_TIMEOUT_MS, 30_000, 1000),
      maxRetries: parseEnvInt(env.AI_MAX_RETRIES, 3, 1, 10),
      retryBackoffSeconds: parseEnvFloat(env.AI_RETRY_BACKOFF_SECONDS, 2, 0),
      responseFormatJson: parseEnvBool(env.AI_RESPONSE_FORMAT_JSON, true),
      alertsEnabled: parseEnvBool(env.AI_ENRICHMENT_ALERTS_ENABLED, false),
      alertThreshold: parseEnvFloat(env.AI_ENRICHMENT_ALERT_THRESHOLD, 0),
      prompts: {
        system: resolvePromptTemplate(env.AI_SYSTEM_PROMPT, promptDefaults.system),
        user: resolvePromptTemplate(env.AI_USER_PROMPT, promptDefaults.user),
        candidateProfile:
          env.AI_CANDIDATE_PROFILE ?? promptDefaults.candidateProfile,
      },
    },
    alerts: {
      telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? "",
      telegramChatId: env.TELEGRAM_CHAT_ID ?? "",
      dryRun: parseEnvBool(env.DRY_RUN, false),
    },
    log: {
      level: parseLogLevel(env.LOG_LEVEL),
      file: env.LOG_FILE ?? "logs/app.log",
    },
  };
}

/** Startup checks that must pass before any network call. */
export function validateConfig(config: AppConfig): void {
  if (!config.sheet.spreadsheetId) {
    throw new ConfigurationError("GOOGLE_SHEET_ID is required");
  }
  if (config.ai.enabled) {
    if (!config.ai.apiKey) {
      throw new ConfigurationError(
        "AI_API_KEY is required when AI_ENRICHMENT_ENABLED is on",
      );
    }
    if (!config.ai.prompts.user.trim()) {
      throw new ConfigurationError(
        "AI user prompt template is required when AI_ENRICHMENT_ENABLED is on",
      );
    }
  }
}

export function logConfigSummary(config: AppConfig, logger: Logger): void {
  const enabledProviders = Object.entries(config.providers)
    .filter(([, p]) => p.enabled)
    .map(([name]) => name);

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${enabledProviders.length} enabled providers: ${enabledProviders.join(", ") || "none"}`,
  );
  logger.info(`  - Locations: ${config.search.locations.join(", ")}`);
  logger.info(`  - Max results per role: ${config.search.maxResultsPerRole}`);
  logger.info(`  - Sheet tab: ${config.sheet.tab}`);
  logger.info(
    `  - AI enrichment: ${config.ai.enabled ? `${config.ai.provider}/${config.ai.model}` : "disabled"}`,
  );

  for (const name of enabledProviders) {
    if (!config.providers[name].apiKey) {
      logger.warn(`${name}: no API key configured — searches will fail`);
    }
  }
  if (config.alerts.dryRun) {
    logger.info("🧪 DRY RUN MODE — no alerts will be sent");
  }
}
