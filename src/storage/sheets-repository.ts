/**
 * Upserts job rows into a spreadsheet keyed by listing URL.
 *
 * The header is an append-only list of column labels: the base columns always
 * lead, and columns discovered from metadata or enrichment keys are appended in
 * first-seen order. Re-opening the same sheet rebuilds the same order from the
 * stored header, so existing data never shifts between runs.
 *
 * The link index only tracks writes made through this instance. Two processes
 * writing the same sheet will race.
 */

import type { Logger } from "../logger";
import { RepositoryError } from "../errors";
import {
  keyToLabel,
  labelToKey,
  mergeDynamicFields,
  toCell,
} from "./columns";
import type { IndexedRow, SheetBackend, UpsertJobInput } from "./types";

export const BASE_HEADER = [
  "Fetched At (UTC)",
  "Role",
  "Job Title",
  "Source",
  "Link",
] as const;

export const ENRICHMENT_KEYS = [
  "ai_fit_score",
  "ai_summary",
  "ai_outreach_angle",
] as const;

const LINK_COLUMN = "Link";

const BASE_LABELS: ReadonlySet<string> = new Set<string>(BASE_HEADER);

export interface OpenRepositoryOptions {
  logger: Logger;
  /** Dynamic keys whose columns are created up front. */
  initialKeys?: readonly string[];
}

export class SheetsRepository {
  private header: string[] = [];
  private readonly labelByKey = new Map<string, string>();
  private readonly keyByLabel = new Map<string, string>();
  private readonly rowsByLink = new Map<string, IndexedRow>();
  private rowCounter = 0;

  constructor(
    private readonly backend: SheetBackend,
    private readonly logger: Logger,
  ) {}

  static async open(
    backend: SheetBackend,
    options: OpenRepositoryOptions,
  ): Promise<SheetsRepository> {
    const repository = new SheetsRepository(backend, options.logger);
    await repository.initialize();
    if (options.initialKeys && options.initialKeys.length > 0) {
      await repository.ensureColumns(options.initialKeys);
    }
    return repository;
  }

  get columns(): string[] {
    return [...this.header];
  }

  /** Number of rows in the sheet, header included. */
  get rowCount(): number {
    return this.rowCounter;
  }

  get size(): number {
    return this.rowsByLink.size;
  }

  hasLink(link: string): boolean {
    return this.rowsByLink.has(link);
  }

  getRow(link: string): IndexedRow | undefined {
    const row = this.rowsByLink.get(link);
    return row ? { rowNumber: row.rowNumber, values: [...row.values] } : undefined;
  }

  async initialize(): Promise<void> {
    const existing = await this.backend.getAllRows();
    this.rowsByLink.clear();

    if (existing.length === 0) {
      this.setHeader([...BASE_HEADER]);
      await this.writeHeader();
      this.rowCounter = 1;
      this.logger.info("Sheet was empty — wrote base header");
      return;
    }

    const storedHeader = existing[0];
    if (!BASE_HEADER.every((label, i) => storedHeader[i] === label)) {
      this.logger.warn(
        `Sheet header does not start with the base columns: ${JSON.stringify(storedHeader.slice(0, BASE_HEADER.length))}`,
      );
    }

    this.setHeader(deriveHeader(storedHeader));
    if (!sameColumns(this.header, storedHeader)) {
      await this.writeHeader();
    }

    this.rowCounter = existing.length;
    const linkIndex = this.header.indexOf(LINK_COLUMN);
    const width = this.header.length;

    existing.slice(1).forEach((row, i) => {
      const link = row[linkIndex] ?? "";
      if (!link) return;
      this.rowsByLink.set(link, {
        rowNumber: i + 2,
        values: fitToWidth(row, width),
      });
    });

    this.logger.info(
      `Sheet loaded: ${width} columns, ${this.rowsByLink.size} indexed jobs`,
    );
  }

  /**
   * Appends a column for every key without one. The header row is rewritten
   * once when anything was added. The new columns only become known after
   * that write succeeds, so a failed write is retried by the next call.
   */
  async ensureColumns(keys: Iterable<string>): Promise<void> {
    const nextHeader = [...this.header];
    const added = new Map<string, string>();

    for (const key of keys) {
      if (!key || this.labelByKey.has(key) || added.has(key)) continue;

      const baseLabel = keyToLabel(key) || key;
      let label = baseLabel;
      let suffix = 2;
      while (nextHeader.includes(label)) {
        label = `${baseLabel} ${suffix}`;
        suffix++;
      }

      nextHeader.push(label);
      added.set(key, label);
    }

    if (added.size === 0) return;

    this.logger.debug(`Adding sheet columns: ${[...added.values()].join(", ")}`);
    await this.writeHeader(nextHeader);

    this.header = nextHeader;
    for (const [key, label] of added) {
      this.labelByKey.set(key, label);
      this.keyByLabel.set(label, key);
    }
  }

  /** Returns `true` when a row was created, `false` when one was updated. */
  async upsert(input: UpsertJobInput): Promise<boolean> {
    const { link } = input;
    if (!link) {
      throw new RepositoryError("A job link is required to upsert a record.");
    }

    const dynamic = mergeDynamicFields(input.metadata, input.enrichment);
    await this.ensureColumns(dynamic.keys());

    const base: Record<string, string> = {
      "Fetched At (UTC)": toCell(input.fetchedAt),
      Role: toCell(input.role),
      "Job Title": toCell(input.title),
      Source: toCell(input.source),
      Link: link,
    };

    const row = this.header.map((column) => {
      if (BASE_LABELS.has(column)) return base[column] ?? "";
      const key = this.keyByLabel.get(column) ?? labelToKey(column);
      return dynamic.get(key) ?? "";
    });

    const existing = this.rowsByLink.get(link);
    if (existing) {
      await this.backend.update(existing.rowNumber, [row]);
      this.rowsByLink.set(link, { rowNumber: existing.rowNumber, values: row });
      return false;
    }

    await this.backend.appendRow(row);
    this.rowCounter++;
    this.rowsByLink.set(link, { rowNumber: this.rowCounter, values: row });
    return true;
  }

  private setHeader(header: string[]): void {
    this.header = header;
    this.labelByKey.clear();
    this.keyByLabel.clear();
    for (const label of header) {
      const key = labelToKey(label);
      this.labelByKey.set(key, label);
      this.keyByLabel.set(label, key);
    }
  }

  private async writeHeader(header: string[] = this.header): Promise<void> {
    await this.backend.update(1, [[...header]]);
  }
}

/** Base columns first, then stored extras in their stored order. */
export function deriveHeader(storedHeader: readonly string[]): string[] {
  const header: string[] = [...BASE_HEADER];
  for (const column of storedHeader) {
    if (!header.includes(column)) {
      header.push(column);
    }
  }
  return header;
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

function fitToWidth(row: readonly string[], width: number): string[] {
  const values = row.slice(0, width).map((cell) => toCell(cell));
  while (values.length < width) values.push("");
  return values;
}
