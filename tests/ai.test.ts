import { describe, expect, it, vi } from "vitest";
import type { AiConfig } from "../src/config";
import { EnrichmentError } from "../src/errors";
import {
  completionsUrl,
  composeRequest,
  createEnricher,
  extractContent,
  requestHeaders,
} from "../src/ai";
import {
  ResponseParseError,
  buildPrompt,
  normalizeEnrichment,
  parseResponseContent,
  renderTemplate,
} from "../src/ai/prompt";
import { jsonResponse, logger, mockFetch } from "./helpers";

function aiConfig(overrides: Partial<AiConfig> = {}): AiConfig {
  return {
    enabled: true,
    provider: "openai",
    model: "test-model",
    apiKey: "test-key",
    org: "",
    baseUrl: "https://llm.example.com/v1/",
    completionsUrl: "",
    temperature: 0.2,
    timeoutMs: 1000,
    maxRetries: 3,
    retryBackoffSeconds: 2,
    responseFormatJson: true,
    alertsEnabled: false,
    alertThreshold: 0,
    prompts: {
      system: "  You review job postings.  ",
      user: "{job_title} at {company} in {location}: {description} ({link}) for {candidate_profile}",
      candidateProfile: "a backend developer",
    },
    ...overrides,
  };
}

function completion(content: unknown) {
  return jsonResponse({ choices: [{ message: { role: "assistant", content } }] });
}

describe("renderTemplate", () => {
  it("leaves unknown placeholders as written", () => {
    expect(renderTemplate("{a} and {b} and {a}", { a: "x" })).toBe("x and {b} and x");
  });
});

describe("buildPrompt", () => {
  it("falls back from posting fields to metadata", () => {
    const prompt = buildPrompt(
      {
        title: "Platform Engineer",
        link: "https://x/1",
        metadata: {
          company: "Acme",
          location: "Toronto",
          snippet: "<p>Run the <b>platform</b> &amp; tooling</p>",
        },
      },
      aiConfig().prompts,
    );

    expect(prompt).toEqual({
      systemPrompt: "You review job postings.",
      userPrompt:
        "Platform Engineer at Acme in Toronto: Run the platform & tooling (https://x/1) for a backend developer",
    });
  });

  it("prefers posting-level values", () => {
    const prompt = buildPrompt(
      {
        title: "Dev",
        company: "Posting Co",
        location: "Remote",
        description: "Direct",
        link: "https://x/2",
        metadata: { company: "Meta Co", description: "From metadata" },
      },
      aiConfig().prompts,
    );

    expect(prompt.userPrompt).toBe(
      "Dev at Posting Co in Remote: Direct (https://x/2) for a backend developer",
    );
  });

  it("requires a user template", () => {
    const prompts = { ...aiConfig().prompts, user: "   " };

    expect(() => buildPrompt({ title: "Dev" }, prompts)).toThrow(EnrichmentError);
  });
});

describe("parseResponseContent", () => {
  it("prefers a fenced JSON block", () => {
    const content = 'Here you go:\n```json\n{"fit_score": 70}\n```\nThanks';

    expect(parseResponseContent(content)).toEqual({ fit_score: 70 });
  });

  it("skips fenced segments that are not objects", () => {
    const content = "```\nnot json\n```\n```json\n{\"summary\": \"ok\"}\n```";

    expect(parseResponseContent(content)).toEqual({ summary: "ok" });
  });

  it("parses bare JSON after removing think blocks", () => {
    expect(
      parseResponseContent('<think>weighing it up</think>\n{"score": 5}'),
    ).toEqual({ score: 5 });
  });

  it("rejects blank content", () => {
    expect(() => parseResponseContent("  \n ")).toThrow(
      new ResponseParseError("Empty response from AI provider"),
    );
  });

  it("rejects arrays and prose", () => {
    expect(() => parseResponseContent("[1, 2]")).toThrow(
      "AI response is not a valid JSON object",
    );
    expect(() => parseResponseContent("no idea")).toThrow(ResponseParseError);
  });
});

describe("normalizeEnrichment", () => {
  it("maps alternate spellings and flattens additional context", () => {
    expect(
      normalizeEnrichment({
        score: 0,
        highlights: "Strong match",
        additional_context: {
          " Culture Fit ": "high",
          "Tech Stack": ["go", "k8s"],
          remote: true,
        },
      }),
    ).toEqual({
      ai_fit_score: 0,
      ai_summary: "Strong match",
      ai_outreach_angle: "",
      ai_extra_culture_fit: "high",
      ai_extra_tech_stack: '["go","k8s"]',
      ai_extra_remote: "true",
    });
  });

  it("uses the first non-empty spelling", () => {
    expect(
      normalizeEnrichment({ fit_score: "", fitScore: 64, outreach: "Mention Go" }),
    ).toMatchObject({ ai_fit_score: 64, ai_outreach_angle: "Mention Go" });
  });
});

describe("request helpers", () => {
  it("builds the completions URL from the base URL", () => {
    expect(completionsUrl(aiConfig())).toBe(
      "https://llm.example.com/v1/chat/completions",
    );
    expect(
      completionsUrl(aiConfig({ completionsUrl: "https://proxy.example.com/c" })),
    ).toBe("https://proxy.example.com/c");
  });

  it("uses api-key for azure and bearer auth otherwise", () => {
    expect(requestHeaders(aiConfig({ provider: "azure" }))).toEqual({
      "Content-Type": "application/json",
      "api-key": "test-key",
    });
    expect(requestHeaders(aiConfig({ org: "org-test" }))).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
      "OpenAI-Organization": "org-test",
    });
    expect(() => requestHeaders(aiConfig({ apiKey: "" }))).toThrow(
      "AI_API_KEY is required for enrichment.",
    );
  });

  it("omits a blank system message and the response format when disabled", () => {
    expect(
      composeRequest(aiConfig({ responseFormatJson: false }), {
        systemPrompt: "",
        userPrompt: "hi",
      }),
    ).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.2,
    });
  });

  it("rejects replies without text content", () => {
    expect(() => extractContent({ choices: [] })).toThrow(
      "AI response missing choices array",
    );
    expect(() => extractContent({ choices: [{ message: { content: null } }] })).toThrow(
      "AI response content is not text",
    );
  });
});

describe("createEnricher", () => {
  it("returns nothing when disabled", async () => {
    const fetchFn = mockFetch(async () => completion("{}"));
    const enricher = createEnricher({
      config: aiConfig({ enabled: false }),
      logger,
      fetchFn,
    });

    await expect(enricher.enrich({ title: "Dev" })).resolves.toEqual({});
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("posts the chat request and normalizes the reply", async () => {
    const fetchFn = mockFetch(async () =>
      completion('{"fit_score": 88, "summary": "Good", "outreach_angle": "Ask"}'),
    );
    const enricher = createEnricher({ config: aiConfig(), logger, fetchFn });

    const enrichment = await enricher.enrich({ title: "Dev", link: "https://x/1" });

    expect(enrichment).toEqual({
      ai_fit_score: 88,
      ai_summary: "Good",
      ai_outreach_angle: "Ask",
    });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://llm.example.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "test-model",
      response_format: { type: "json_object" },
    });
  });

  it("retries until an attempt succeeds", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const fetchFn = mockFetch(async () => {
      calls++;
      return calls === 1 ? completion("") : completion('{"score": 51}');
    });
    const enricher = createEnricher({ config: aiConfig(), logger, fetchFn, sleep });

    const enrichment = await enricher.enrich({ title: "Dev" });

    expect(enrichment.ai_fit_score).toBe(51);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("raises one error carrying the last failure after every attempt fails", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fetchFn = mockFetch(async () => {
      throw new Error("boom");
    });
    const enricher = createEnricher({ config: aiConfig(), logger, fetchFn, sleep });

    await expect(enricher.enrich({ title: "Dev" })).rejects.toThrow(
      new EnrichmentError("boom"),
    );
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("treats a non-2xx status as a failed attempt", async () => {
    const fetchFn = mockFetch(async () => jsonResponse({ error: "busy" }, 503));
    const enricher = createEnricher({
      config: aiConfig({ maxRetries: 1 }),
      logger,
      fetchFn,
    });

    await expect(enricher.enrich({ title: "Dev" })).rejects.toThrow(
      'HTTP 503: {"error":"busy"}',
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("fails before any request when the template is missing", async () => {
    const fetchFn = mockFetch(async () => completion("{}"));
    const config = aiConfig();
    const enricher = createEnricher({
      config: { ...config, prompts: { ...config.prompts, user: "" } },
      logger,
      fetchFn,
    });

    await expect(enricher.enrich({ title: "Dev" })).rejects.toThrow(
      "AI user prompt template is not configured.",
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
