/**
 * Row-oriented spreadsheet access. Row numbers are 1-based and row 1 holds the
 * header when the sheet is not empty.
 */
export interface SheetBackend {
  getAllRows(): Promise<string[][]>;
  /** Overwrites `rows` starting at column A of `startRow`. */
  update(startRow: number, rows: string[][]): Promise<void>;
  appendRow(row: string[]): Promise<void>;
}

export type CellValue = string | number | boolean | null | undefined;

export interface IndexedRow {
  rowNumber: number;
  values: string[];
}

export interface UpsertJobInput {
  fetchedAt?: string | null;
  role?: string | null;
  title?: string | null;
  source?: string | null;
  link: string;
  metadata?: Record<string, CellValue> | null;
  enrichment?: Record<string, CellValue> | null;
}
