import type { Logger } from "../logger";
import type { AiConfig } from "../config";
import { EnrichmentError, errorMessage } from "../errors";
import { fetchJson, sleep as defaultSleep } from "../providers/base";
import type { Enrichment } from "../types";
import {
  ResponseParseError,
  buildPrompt,
  normalizeEnrichment,
  parseResponseContent,
} from "./prompt";
import type {
  ChatCompletionRequest,
  ChatMessage,
  Enricher,
  EnrichmentInput,
  PromptPayload,
} from "./types";

export interface EnricherOptions {
  config: AiConfig;
  logger: Logger;
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export function completionsUrl(config: AiConfig): string {
  if (config.completionsUrl) return config.completionsUrl;
  const base = config.baseUrl
    ? config.baseUrl.replace(/\/+$/, "")
    : "https://api.openai.com/v1";
  return `${base}/chat/completions`;
}

export function requestHeaders(config: AiConfig): Record<string, string> {
  if (!config.apiKey) {
    throw new EnrichmentError("AI_API_KEY is required for enrichment.");
  }

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (config.provider === "azure") {
    headers["api-key"] = config.apiKey;
  } else {
    headers.Authorization = `Bearer ${config.apiKey}`;
  }
  if (config.org) {
    headers["OpenAI-Organization"] = config.org;
  }
  return headers;
}

export function composeRequest(
  config: AiConfig,
  prompt: PromptPayload,
): ChatCompletionRequest {
  const messages: ChatMessage[] = [];
  if (prompt.systemPrompt) {
    messages.push({ role: "system", content: prompt.systemPrompt });
  }
  messages.push({ role: "user", content: prompt.userPrompt });

  const request: ChatCompletionRequest = {
    model: config.model,
    messages,
    temperature: config.temperature,
  };
  if (config.responseFormatJson) {
    request.response_format = { type: "json_object" };
  }
  return request;
}

/** Pulls the first choice's message text out of a chat-completion body. */
export function extractContent(data: unknown): string {
  const choices =
    typeof data === "object" && data !== null && "choices" in data
      ? data.choices
      : undefined;
  if (!Array.isArray(choices) || choices.length === 0) {
    throw new ResponseParseError("AI response missing choices array");
  }

  const first: unknown = choices[0];
  const message =
    typeof first === "object" && first !== null && "message" in first
      ? first.message
      : undefined;
  const content =
    typeof message === "object" && message !== null && "content" in message
      ? message.content
      : undefined;
  if (typeof content !== "string") {
    throw new ResponseParseError("AI response content is not text");
  }
  return content;
}

export function createEnricher(options: EnricherOptions): Enricher {
  const { config, logger, fetchFn } = options;
  const sleep = options.sleep ?? defaultSleep;

  async function enrich(posting: EnrichmentInput): Promise<Enrichment> {
    if (!config.enabled) return {};

    const prompt = buildPrompt(posting, config.prompts);
    const headers = requestHeaders(config);
    const url = completionsUrl(config);
    const body = JSON.stringify(composeRequest(config, prompt));
    const maxAttempts = Math.max(1, config.maxRetries);
    const backoffMs = Math.max(0, config.retryBackoffSeconds * 1000);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const data = await fetchJson({
          url,
          method: "POST",
          headers,
          body,
          timeoutMs: config.timeoutMs,
          fetchFn,
        });
        const enrichment = normalizeEnrichment(
          parseResponseContent(extractContent(data)),
        );
        logger.debug(
          `AI: enriched ${posting.link ?? posting.title ?? "posting"} (fit ${enrichment.ai_fit_score || "n/a"})`,
        );
        return enrichment;
      } catch (error) {
        lastError = error;
        logger.warn(
          `AI enrichment attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}`,
        );
        if (attempt < maxAttempts) {
          await sleep(backoffMs);
        }
      }
    }

    throw new EnrichmentError(
      lastError ? errorMessage(lastError) : "Unknown AI enrichment failure",
    );
  }

  return { enabled: config.enabled, enrich };
}

export { EnrichmentError } from "../errors";
export type { Enricher, EnrichmentInput } from "./types";
