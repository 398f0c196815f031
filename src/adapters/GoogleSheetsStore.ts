import { google, sheets_v4 } from "googleapis";
import type { Grid, TabularStore } from "./TabularStore.js";
import { ensureTitle } from "./sheetTitles.js";
import { BackoffPolicy, DEFAULT_BACKOFF, withBackoff } from "../transport/backoff.js";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

export type SheetsCredentials =
  | { kind: "inline"; json: string }
  | { kind: "keyFile"; path: string };

function parseServiceAccount(json: string): { client_email: string; private_key: string } {
  const parsed: unknown = JSON.parse(json);
  if (
    typeof parsed === "object" && parsed !== null &&
    "client_email" in parsed && typeof parsed.client_email === "string" &&
    "private_key" in parsed && typeof parsed.private_key === "string"
  ) {
    return { client_email: parsed.client_email, private_key: parsed.private_key };
  }
  throw new Error("GCP_SA_JSON is not a service account key (client_email/private_key missing)");
}

export function createSheetsClient(creds: SheetsCredentials): sheets_v4.Sheets {
  const auth =
    creds.kind === "inline"
      ? new google.auth.GoogleAuth({ credentials: parseServiceAccount(creds.json), scopes: SCOPES })
      : new google.auth.GoogleAuth({ keyFile: creds.path, scopes: SCOPES });
  return google.sheets({ version: "v4", auth });
}

function asDisplayString(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v);
}

export class GoogleSheetsStore implements TabularStore {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly backoff: BackoffPolicy = DEFAULT_BACKOFF
  ) {}

  async getValues(storeId: string, range: string): Promise<string[][]> {
    const res = await withBackoff(`values.get ${range}`, () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId: storeId,
        range,
        valueRenderOption: "FORMATTED_VALUE"
      }), this.backoff);
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map(asDisplayString));
  }

  async updateValues(storeId: string, range: string, grid: Grid): Promise<void> {
    await withBackoff(`values.update ${range}`, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: storeId,
        range,
        valueInputOption: "RAW",
        requestBody: { values: grid }
      }), this.backoff);
  }

  async clearRange(storeId: string, range: string): Promise<void> {
    await withBackoff(`values.clear ${range}`, () =>
      this.sheets.spreadsheets.values.clear({ spreadsheetId: storeId, range, requestBody: {} }), this.backoff);
  }

  async listSheetTitles(storeId: string): Promise<string[]> {
    const res = await withBackoff(`spreadsheets.get ${storeId}`, () =>
      this.sheets.spreadsheets.get({ spreadsheetId: storeId, fields: "sheets.properties.title" }), this.backoff);
    const titles: string[] = [];
    for (const s of res.data.sheets ?? []) {
      const t = s.properties?.title;
      if (typeof t === "string") titles.push(t);
    }
    return titles;
  }

  async ensureSheetExists(storeId: string, title: string): Promise<string> {
    return ensureTitle(
      () => this.listSheetTitles(storeId),
      async (t) => {
        await withBackoff(`addSheet ${t}`, () =>
          this.sheets.spreadsheets.batchUpdate({
            spreadsheetId: storeId,
            requestBody: { requests: [{ addSheet: { properties: { title: t } } }] }
          }), this.backoff);
      },
      title
    );
  }
}
