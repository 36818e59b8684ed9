import { google, type sheets_v4 } from 'googleapis';
import { describeError, UploadError } from '../errors.js';
import type { GoogleServiceAccount, SheetTarget } from '../types/config.js';
import { NUMERIC_COLUMNS } from '../types/export.js';
import { readCsv } from './csv.js';
import type { Logger } from './logger.js';

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';
export const HEADROOM_ROWS = 100;
export const HEADROOM_COLUMNS = 5;

export interface SheetTab {
  sheetId: number;
  title: string;
  rowCount: number;
  columnCount: number;
}

/**
 * The spreadsheet operations an upload needs. `GoogleSheetsClient` talks to
 * the Sheets API; tests supply an in-memory implementation.
 */
export interface SpreadsheetClient {
  listTabs(spreadsheetId: string): Promise<SheetTab[]>;
  addTab(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<void>;
  resizeTab(spreadsheetId: string, tab: SheetTab, rowCount: number, columnCount: number): Promise<void>;
  clearTab(spreadsheetId: string, title: string): Promise<void>;
  writeValues(spreadsheetId: string, title: string, values: string[][]): Promise<void>;
}

export function quoteTabName(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

const NON_FINITE = new Set(['nan', 'inf', '+inf', '-inf', 'infinity', '+infinity', '-infinity']);

/** The Sheets API rejects NaN and infinities, so those cells become empty. */
export function sanitizeCell(value: string): string {
  return NON_FINITE.has(value.trim().toLowerCase()) ? '' : value;
}

const NUMERIC_COLUMN_NAMES = new Set<string>(NUMERIC_COLUMNS);

/** Sanitizes the numeric columns named by the header row; text cells stay as written. */
export function sanitizeGrid(values: readonly string[][]): string[][] {
  const [header = []] = values;
  const numeric = new Set(header.flatMap((name, index) => (NUMERIC_COLUMN_NAMES.has(name) ? [index] : [])));
  return values.map((row, rowIndex) =>
    rowIndex === 0 ? [...row] : row.map((cell, index) => (numeric.has(index) ? sanitizeCell(cell) : cell))
  );
}

export class GoogleSheetsClient implements SpreadsheetClient {
  private sheets: sheets_v4.Sheets;

  constructor(credentials: GoogleServiceAccount) {
    const auth = new google.auth.GoogleAuth({
      credentials: {
        type: 'service_account',
        project_id: credentials.projectId,
        private_key_id: credentials.privateKeyId,
        private_key: credentials.privateKey,
        client_email: credentials.clientEmail,
        client_id: credentials.clientId,
      },
      scopes: [SHEETS_SCOPE],
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async listTabs(spreadsheetId: string): Promise<SheetTab[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'sheets.properties',
    });
    return (response.data.sheets ?? []).map((sheet) => ({
      sheetId: sheet.properties?.sheetId ?? 0,
      title: sheet.properties?.title ?? '',
      rowCount: sheet.properties?.gridProperties?.rowCount ?? 0,
      columnCount: sheet.properties?.gridProperties?.columnCount ?? 0,
    }));
  }

  async addTab(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } }],
      },
    });
  }

  async resizeTab(spreadsheetId: string, tab: SheetTab, rowCount: number, columnCount: number): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [
          {
            updateSheetProperties: {
              properties: { sheetId: tab.sheetId, gridProperties: { rowCount, columnCount } },
              fields: 'gridProperties(rowCount,columnCount)',
            },
          },
        ],
      },
    });
  }

  async clearTab(spreadsheetId: string, title: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId,
      range: quoteTabName(title),
      requestBody: {},
    });
  }

  async writeValues(spreadsheetId: string, title: string, values: string[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range: `${quoteTabName(title)}!A1`,
      valueInputOption: 'USER_ENTERED',
      requestBody: { values },
    });
  }
}

export class SheetsUploader {
  constructor(
    private client: SpreadsheetClient,
    private logger: Logger
  ) {}

  /**
   * Replaces the whole tab with the CSV grid, creating the tab first when
   * the spreadsheet does not have it.
   */
  async upload(csvFile: string, target: SheetTarget): Promise<number> {
    const { spreadsheetId, tabName } = target;
    try {
      const values = sanitizeGrid(await readCsv(csvFile));
      const rowCount = values.length;
      const columnCount = Math.max(0, ...values.map((row) => row.length));

      const tabs = await this.client.listTabs(spreadsheetId);
      const tab = tabs.find((candidate) => candidate.title === tabName);
      if (!tab) {
        this.logger.info(`Creating tab "${tabName}"`, { spreadsheetId });
        await this.client.addTab(spreadsheetId, tabName, rowCount + HEADROOM_ROWS, columnCount + HEADROOM_COLUMNS);
      } else if (tab.rowCount < rowCount || tab.columnCount < columnCount) {
        await this.client.resizeTab(
          spreadsheetId,
          tab,
          Math.max(tab.rowCount, rowCount + HEADROOM_ROWS),
          Math.max(tab.columnCount, columnCount + HEADROOM_COLUMNS)
        );
      }

      await this.client.clearTab(spreadsheetId, tabName);
      await this.client.writeValues(spreadsheetId, tabName, values);
      this.logger.info(`Successfully uploaded ${csvFile} to Google Sheet ID: ${spreadsheetId}, Tab: ${tabName}`);
      return rowCount;
    } catch (error) {
      throw new UploadError(
        `Error uploading to Google Sheets: ${describeError(error)}`,
        spreadsheetId,
        tabName,
        { cause: error }
      );
    }
  }
}
