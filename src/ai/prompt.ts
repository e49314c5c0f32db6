import type { PromptTemplates } from "../config";
import { EnrichmentError } from "../errors";
import type { Enrichment, EnrichmentValue } from "../types";
import type { EnrichmentInput, PromptPayload } from "./types";

export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseParseError";
  }
}

export const EXTRA_FIELD_PREFIX = "ai_extra_";

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

const MAX_JD_LENGTH = 8000;

export function truncateDescription(text: string): string {
  if (text.length <= MAX_JD_LENGTH) return text;
  return text.substring(0, MAX_JD_LENGTH) + "\n\n[...truncated for length]";
}

/** Fills `{name}` placeholders; unknown placeholders are left as written. */
export function renderTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
  );
}

function pick(...candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim()) return candidate.trim();
  }
  return "";
}

export function buildPrompt(
  posting: EnrichmentInput,
  templates: PromptTemplates,
): PromptPayload {
  const metadata = posting.metadata ?? {};

  const userTemplate = templates.user.trim();
  if (!userTemplate) {
    throw new EnrichmentError("AI user prompt template is not configured.");
  }

  const description = pick(
    posting.description,
    metadata.description,
    metadata.snippet,
  );

  const userPrompt = renderTemplate(userTemplate, {
    candidate_profile: templates.candidateProfile.trim(),
    job_title: pick(posting.title, metadata.title),
    company: pick(posting.company, metadata.company),
    location: pick(posting.location, metadata.location),
    description: truncateDescription(stripHtml(description)),
    link: pick(posting.link, metadata.link),
  });

  return { systemPrompt: templates.system.trim(), userPrompt };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Extracts the JSON object from a model reply. A fenced block that parses as
 * an object is preferred over the surrounding text.
 */
export function parseResponseContent(content: string): Record<string, unknown> {
  // Some models emit reasoning before the JSON.
  const text = content.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();
  if (!text) {
    throw new ResponseParseError("Empty response from AI provider");
  }

  if (text.includes("```")) {
    for (const rawSegment of text.split("```")) {
      let segment = rawSegment.trim();
      if (!segment) continue;
      if (segment.toLowerCase().startsWith("json")) {
        segment = segment.slice(4).trim();
      }
      const fenced = parseObject(segment);
      if (fenced) return fenced;
    }
  }

  const whole = parseObject(text);
  if (!whole) {
    throw new ResponseParseError("AI response is not a valid JSON object");
  }
  return whole;
}

function hasValue(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function firstValue(
  data: Record<string, unknown>,
  keys: readonly string[],
): unknown {
  for (const key of keys) {
    if (hasValue(data[key])) return data[key];
  }
  return undefined;
}

export function toEnrichmentValue(value: unknown): EnrichmentValue {
  if (value === undefined || value === null) return "";
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function normalizeExtraKey(key: string): string {
  return key.trim().toLowerCase().replace(/ /g, "_");
}

/** Maps accepted spellings onto the canonical `ai_*` fields. */
export function normalizeEnrichment(data: Record<string, unknown>): Enrichment {
  const result: Enrichment = {
    ai_fit_score: toEnrichmentValue(
      firstValue(data, ["fit_score", "score", "fitScore"]),
    ),
    ai_summary: toEnrichmentValue(firstValue(data, ["summary", "highlights"])),
    ai_outreach_angle: toEnrichmentValue(
      firstValue(data, ["outreach_angle", "outreach"]),
    ),
  };

  const additional = data.additional_context;
  if (isRecord(additional)) {
    for (const [key, value] of Object.entries(additional)) {
      const normalized = normalizeExtraKey(key);
      if (!normalized) continue;
      result[`${EXTRA_FIELD_PREFIX}${normalized}`] = toEnrichmentValue(value);
    }
  }
  return result;
}
