import { vi } from "vitest";
import { createSilentLogger } from "../src/logger";
import type { ProviderSettings } from "../src/config";
import type { SheetBackend } from "../src/storage/types";

export const logger = createSilentLogger();

/** In-memory stand-in for a spreadsheet tab. */
export class InMemorySheet implements SheetBackend {
  rows: string[][];
  readonly updates: Array<{ startRow: number; rows: string[][] }> = [];
  readonly appends: string[][] = [];

  constructor(rows: string[][] = []) {
    this.rows = rows.map((row) => [...row]);
  }

  async getAllRows(): Promise<string[][]> {
    return this.rows.map((row) => [...row]);
  }

  async update(startRow: number, rows: string[][]): Promise<void> {
    this.updates.push({ startRow, rows: rows.map((row) => [...row]) });
    rows.forEach((row, i) => {
      const index = startRow - 1 + i;
      while (this.rows.length < index) this.rows.push([]);
      this.rows[index] = [...row];
    });
  }

  async appendRow(row: string[]): Promise<void> {
    this.appends.push([...row]);
    this.rows.push([...row]);
  }

  headerWrites(): string[][] {
    return this.updates.filter((u) => u.startRow === 1).map((u) => u.rows[0]);
  }
}

/** Rejects the next header write once armed. */
export class FailingHeaderSheet extends InMemorySheet {
  failNextHeaderWrite = false;

  override async update(startRow: number, rows: string[][]): Promise<void> {
    if (startRow === 1 && this.failNextHeaderWrite) {
      this.failNextHeaderWrite = false;
      throw new Error("503 Service Unavailable");
    }
    await super.update(startRow, rows);
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function providerSettings(
  overrides: Partial<ProviderSettings> = {},
): ProviderSettings {
  return {
    enabled: true,
    module: "serpapi-jobs",
    resultLimit: 5,
    label: "Test Board",
    site: "jobs.example.com",
    apiKey: "test-key",
    timeoutMs: 1000,
    ...overrides,
  };
}

export function mockFetch(
  impl: (url: string, init?: RequestInit) => Promise<Response>,
) {
  return vi.fn((input: string | URL | Request, init?: RequestInit) =>
    impl(String(input), init),
  );
}
