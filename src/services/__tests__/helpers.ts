import type { AxiosInstance, AxiosResponse } from 'axios';
import { vi } from 'vitest';
import type { LogContext, Logger, LogLevel } from '../logger.js';
import type { SheetTab, SpreadsheetClient } from '../sheets.js';

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
}

export class MemoryLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private baseContext: LogContext = {}
  ) {}

  debug(message: string, context?: LogContext): void {
    this.push('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.push('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.push('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.push('error', message, context);
  }

  child(context: LogContext): Logger {
    return new MemoryLogger(this.records, { ...this.baseContext, ...context });
  }

  messages(level: LogLevel): string[] {
    return this.records.filter((record) => record.level === level).map((record) => record.message);
  }

  private push(level: LogLevel, message: string, context?: LogContext): void {
    this.records.push({ level, message, context: { ...this.baseContext, ...context } });
  }
}

export function createHttp(get: ReturnType<typeof vi.fn>): AxiosInstance {
  return { get } as unknown as AxiosInstance;
}

export function pageResponse(data: unknown, headers: Record<string, string> = {}): AxiosResponse {
  return { data, headers, status: 200, statusText: 'OK' } as unknown as AxiosResponse;
}

export function rawEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1001,
    spent_date: '2024-03-04',
    hours: 2,
    rounded_hours: 2,
    notes: 'Code review',
    billable: true,
    is_billed: false,
    is_locked: false,
    locked_reason: null,
    billable_rate: 100,
    created_at: '2024-03-04T10:00:00Z',
    updated_at: '2024-03-04T12:00:00Z',
    user: { id: 1, name: 'Jane Mary Doe' },
    client: { id: 2, name: 'Acme' },
    project: { id: 3, name: 'Website', code: 'WEB' },
    task: { id: 4, name: 'Development' },
    user_assignment: { is_active: true },
    external_reference: null,
    ...overrides,
  };
}

interface FakeTab {
  sheetId: number;
  title: string;
  rowCount: number;
  columnCount: number;
  values: string[][];
}

/** In-memory spreadsheet keyed by spreadsheet id. */
export class FakeSpreadsheetClient implements SpreadsheetClient {
  readonly tabs = new Map<string, FakeTab[]>();
  readonly calls: string[] = [];
  private nextSheetId = 1;

  seedTab(spreadsheetId: string, title: string, values: string[][], rowCount = 1000, columnCount = 26): void {
    const tabs = this.tabs.get(spreadsheetId) ?? [];
    tabs.push({ sheetId: this.nextSheetId++, title, rowCount, columnCount, values });
    this.tabs.set(spreadsheetId, tabs);
  }

  values(spreadsheetId: string, title: string): string[][] | undefined {
    return this.find(spreadsheetId, title)?.values;
  }

  find(spreadsheetId: string, title: string): FakeTab | undefined {
    return (this.tabs.get(spreadsheetId) ?? []).find((tab) => tab.title === title);
  }

  async listTabs(spreadsheetId: string): Promise<SheetTab[]> {
    this.calls.push('listTabs');
    return (this.tabs.get(spreadsheetId) ?? []).map(({ sheetId, title, rowCount, columnCount }) => ({
      sheetId,
      title,
      rowCount,
      columnCount,
    }));
  }

  async addTab(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<void> {
    this.calls.push('addTab');
    this.seedTab(spreadsheetId, title, [], rowCount, columnCount);
  }

  async resizeTab(spreadsheetId: string, tab: SheetTab, rowCount: number, columnCount: number): Promise<void> {
    this.calls.push('resizeTab');
    const existing = this.find(spreadsheetId, tab.title);
    if (existing) {
      existing.rowCount = rowCount;
      existing.columnCount = columnCount;
    }
  }

  async clearTab(spreadsheetId: string, title: string): Promise<void> {
    this.calls.push('clearTab');
    const existing = this.find(spreadsheetId, title);
    if (existing) {
      existing.values = [];
    }
  }

  async writeValues(spreadsheetId: string, title: string, values: string[][]): Promise<void> {
    this.calls.push('writeValues');
    const existing = this.find(spreadsheetId, title);
    if (!existing) {
      throw new Error(`Unable to parse range: ${title}!A1`);
    }
    const merged = existing.values.map((row) => [...row]);
    values.forEach((row, index) => {
      merged[index] = [...row];
    });
    existing.values = merged;
  }
}
