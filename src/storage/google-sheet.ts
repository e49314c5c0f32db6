import { google, type sheets_v4 } from "googleapis";
import type { SheetConfig } from "../config";
import { ConfigurationError } from "../errors";
import type { SheetBackend } from "./types";

const SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive",
];

export function quoteSheetName(tab: string): string {
  return `'${tab.replace(/'/g, "''")}'`;
}

export class GoogleSheetBackend implements SheetBackend {
  private readonly tabRange: string;

  constructor(
    private readonly api: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    tab: string,
  ) {
    this.tabRange = quoteSheetName(tab);
  }

  /** Authorizes with the service-account key file named in the config. */
  static fromConfig(config: SheetConfig): GoogleSheetBackend {
    if (!config.spreadsheetId) {
      throw new ConfigurationError("GOOGLE_SHEET_ID is required");
    }
    const auth = new google.auth.GoogleAuth({
      keyFile: config.serviceAccountFile,
      scopes: SCOPES,
    });
    const api = google.sheets({ version: "v4", auth });
    return new GoogleSheetBackend(api, config.spreadsheetId, config.tab);
  }

  async getAllRows(): Promise<string[][]> {
    const response = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: this.tabRange,
      majorDimension: "ROWS",
    });
    const values: unknown[][] = response.data.values ?? [];
    return values.map((row) =>
      row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))),
    );
  }

  async update(startRow: number, rows: string[][]): Promise<void> {
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${this.tabRange}!A${startRow}`,
      valueInputOption: "RAW",
      requestBody: { values: rows },
    });
  }

  async appendRow(row: string[]): Promise<void> {
    await this.api.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${this.tabRange}!A1`,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: [row] },
    });
  }
}
