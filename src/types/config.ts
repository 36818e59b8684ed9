import type { HarvestCredentials, PageErrorPolicy } from './harvest.js';

export interface GoogleServiceAccount {
  projectId: string;
  privateKeyId: string;
  privateKey: string;
  clientEmail: string;
  clientId: string;
}

export interface SheetTarget {
  spreadsheetId: string;
  tabName: string;
}

export interface UploadConfig {
  enabled: boolean;
  target?: SheetTarget;
  credentials?: GoogleServiceAccount;
  /** Variables that keep the upload from running when it is enabled. */
  missing: string[];
}

export interface ReportOptions {
  summary: boolean;
  resume: boolean;
  advanced: boolean;
  summaryTasks: [string, string];
}

/**
 * Everything one export run needs, resolved once per identity.
 */
export interface IdentityConfig {
  prefix: string;
  harvest: HarvestCredentials;
  userId?: number;
  outputDir: string;
  csvFile: string;
  rawJsonFile?: string;
  envDates: { from?: string; to?: string };
  report: ReportOptions;
  pageErrorPolicy: PageErrorPolicy;
  upload: UploadConfig;
}

export interface CliOverrides {
  fromDate?: string;
  toDate?: string;
  output?: string;
  json?: string;
  summary?: boolean;
  resume?: boolean;
  advanced?: boolean;
  onPageError?: string;
  upload?: boolean;
}
