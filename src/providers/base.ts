export interface FetchJsonOptions {
  url: string;
  timeoutMs: number;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  fetchFn?: typeof fetch;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * Fetches `url` and parses the body as JSON. Non-2xx responses and timeouts
 * reject.
 */
export async function fetchJson(options: FetchJsonOptions): Promise<unknown> {
  const { url, timeoutMs, method, headers, body } = options;
  const fetchFn = options.fetchFn ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: method ?? "GET",
      body,
      signal: controller.signal,
      headers: {
        Accept: "application/json",
        "User-Agent": "JobSheetSync/1.0",
        ...headers,
      },
    });

    if (!response.ok) {
      const text = await response.text();
      throw new HttpError(
        response.status,
        `HTTP ${response.status}: ${text.substring(0, 200) || response.statusText}`,
      );
    }

    // Timeout stays armed until the body is read.
    const data: unknown = await response.json();
    return data;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`Timeout after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
