import { google } from "googleapis";
import { JWT } from "google-auth-library";
import { sheetsConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { amountFromNumber, parseLocaleNumber, type Amount } from "../utils/money.js";

// Declared total for a parent group, or null when the group is not listed.
export interface ReferenceValueSource {
  readonly name: string;
  lookup(parentId: string): Promise<Amount | null>;
}

const findColumn = (
  headers: readonly string[],
  preferred: readonly string[],
  fallback: readonly string[]
): number => {
  const exact = headers.findIndex((header) => preferred.every((word) => header.includes(word)));
  if (exact >= 0) return exact;
  return headers.findIndex((header) => fallback.some((word) => header.includes(word)));
};

/**
 * Finds the declared amount for `key` in a sheet whose first row holds
 * headers. The key column is the "entry summary number" column (or any
 * "entry"/"esn" column); the amount column is the "line tariff goods value
 * amount" column (or any "amount"/"value" column).
 */
export const findDeclaredAmount = (rows: readonly string[][], key: string): Amount | null => {
  if (rows.length < 2) return null;

  const headers = rows[0].map((header) => header.toLowerCase().trim());
  const keyColumn = findColumn(headers, ["entry", "summary", "number"], ["entry", "esn"]);
  const amountColumn = findColumn(
    headers,
    ["line", "tariff", "goods", "value", "amount"],
    ["amount", "value"]
  );
  if (keyColumn < 0 || amountColumn < 0) return null;

  const wanted = key.trim().toLowerCase();
  const row = rows
    .slice(1)
    .find((cells) => (cells[keyColumn] ?? "").trim().toLowerCase() === wanted);
  if (!row) return null;

  const value = parseLocaleNumber(row[amountColumn] ?? "");
  return value === null ? null : amountFromNumber(value);
};

export interface SheetsReferenceOptions {
  serviceAccountEmail: string;
  privateKey: string;
  spreadsheetId: string;
  range: string;
}

// Reads the sheet once per instance; later lookups hit the loaded rows.
export class SheetsReferenceSource implements ReferenceValueSource {
  readonly name = "google-sheets";
  private rows: Promise<string[][]> | null = null;

  constructor(private readonly options: SheetsReferenceOptions) {}

  static fromConfig(): SheetsReferenceSource | null {
    const { serviceAccountEmail, privateKey, spreadsheetId, range } = sheetsConfig;
    if (!serviceAccountEmail || !privateKey || !spreadsheetId) {
      return null;
    }
    return new SheetsReferenceSource({ serviceAccountEmail, privateKey, spreadsheetId, range });
  }

  async lookup(parentId: string): Promise<Amount | null> {
    const rows = await this.loadRows();
    return findDeclaredAmount(rows, parentId);
  }

  private loadRows(): Promise<string[][]> {
    if (!this.rows) {
      this.rows = this.fetchRows().catch((error: unknown) => {
        this.rows = null;
        throw error;
      });
    }
    return this.rows;
  }

  private async fetchRows(): Promise<string[][]> {
    // Keys stored in .env carry literal "\n" sequences
    const auth = new JWT({
      email: this.options.serviceAccountEmail,
      key: this.options.privateKey.replace(/\\n/g, "\n"),
      scopes: ["https://www.googleapis.com/auth/spreadsheets.readonly"],
    });
    const sheets = google.sheets({ version: "v4", auth });

    try {
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId: this.options.spreadsheetId,
        range: this.options.range,
      });
      const rows = (response.data.values ?? []).map((row) =>
        row.map((cell) => (cell === null || cell === undefined ? "" : String(cell)))
      );
      console.log(
        `✅ [REFERENCE_SHEET_LOADED] spreadsheet=${this.options.spreadsheetId} rows=${rows.length}`
      );
      return rows;
    } catch (error) {
      console.error(
        `❌ [REFERENCE_SHEET_FAILED] spreadsheet=${this.options.spreadsheetId} error=${errorMessage(error)}`
      );
      throw error;
    }
  }
}
