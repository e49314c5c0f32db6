import type { Enrichment, Posting } from "../types";

export interface PromptPayload {
  systemPrompt: string;
  userPrompt: string;
}

/** Posting-shaped input; every field is optional and may sit under metadata. */
export type EnrichmentInput = Partial<Omit<Posting, "metadata">> & {
  metadata?: Record<string, string>;
};

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  response_format?: { type: "json_object" };
}

export interface Enricher {
  readonly enabled: boolean;
  enrich(posting: EnrichmentInput): Promise<Enrichment>;
}
