import { ConfigurationError, describeError, ExportStepError, HarvestRequestError } from '../errors.js';
import type { CliOverrides, GoogleServiceAccount, IdentityConfig } from '../types/config.js';
import { columnsFor, type DateRange, type OutputRow, type ResolvedDateRange } from '../types/export.js';
import type { HarvestFetchResult } from '../types/harvest.js';
import { identityLabel, loadIdentityConfig, type Env } from './config.js';
import { resolveOutputPath, writeCsv, writeRawJson } from './csv.js';
import { resolveDateRange } from './dateRange.js';
import { HarvestService } from './harvest.js';
import type { Logger } from './logger.js';
import { normalizeEntries, type NormalizeResult } from './normalizer.js';
import { buildResumeRows, buildSummaryRows } from './report.js';
import { GoogleSheetsClient, SheetsUploader, type SpreadsheetClient } from './sheets.js';

export interface TimeEntrySource {
  getTimeEntries(range: DateRange, userId?: number): Promise<HarvestFetchResult>;
}

export interface PipelineDependencies {
  logger: Logger;
  clock?: () => Date;
  createSource?: (config: IdentityConfig, logger: Logger) => TimeEntrySource;
  createSpreadsheetClient?: (credentials: GoogleServiceAccount) => SpreadsheetClient;
}

export interface ExportResult {
  identity: string;
  range: ResolvedDateRange;
  csvPath: string;
  rawJsonPath?: string;
  entryRows: number;
  skippedEntries: number;
  skippedPages: number[];
  uploaded: boolean;
  uploadError?: Error;
}

export type IdentityOutcome =
  | { identity: string; ok: true; result: ExportResult }
  | { identity: string; ok: false; error: Error };

interface CsvExport {
  payload: HarvestFetchResult;
  normalized: NormalizeResult;
  csvPath: string;
  rawJsonPath?: string;
}

function defaultSource(config: IdentityConfig, logger: Logger): TimeEntrySource {
  return new HarvestService(config.harvest, { logger, pageErrorPolicy: config.pageErrorPolicy });
}

function defaultSpreadsheetClient(credentials: GoogleServiceAccount): SpreadsheetClient {
  return new GoogleSheetsClient(credentials);
}

/**
 * One identity's export: resolve dates, fetch every page, normalize, write
 * the CSV and, when enabled, replace the Google Sheets tab.
 */
export class ExportPipeline {
  private logger: Logger;

  constructor(private deps: PipelineDependencies) {
    this.logger = deps.logger;
  }

  async run(config: IdentityConfig, overrides: CliOverrides = {}): Promise<ExportResult> {
    const identity = identityLabel(config.prefix);
    const logger = this.logger.child({ identity });

    logger.info(`Processing time entries for: ${config.harvest.userAgent} (Prefix: ${config.prefix || 'none'})`);
    const range = resolveDateRange(
      { from: overrides.fromDate, to: overrides.toDate },
      config.envDates,
      logger,
      this.deps.clock
    );

    const { payload, normalized, csvPath, rawJsonPath } = await this.exportToCsv(config, range, logger);

    const result: ExportResult = {
      identity,
      range,
      csvPath,
      rawJsonPath,
      entryRows: normalized.rows.length,
      skippedEntries: normalized.skipped,
      skippedPages: payload.skippedPages,
      uploaded: false,
    };

    if (!config.upload.enabled) {
      logger.info('Google Sheets upload: disabled (set UPLOAD_TO_GOOGLE_SHEET=1 to enable)');
      return result;
    }

    try {
      await this.upload(config, csvPath, logger);
      result.uploaded = true;
    } catch (error) {
      result.uploadError = error instanceof Error ? error : new Error(describeError(error));
      logger.error(`Failed to upload to Google Sheets: ${describeError(error)}`, {
        from: range.from,
        to: range.to,
        csv: csvPath,
      });
    }
    return result;
  }

  private async exportToCsv(config: IdentityConfig, range: ResolvedDateRange, logger: Logger): Promise<CsvExport> {
    let operation = 'fetch';
    try {
      const source = (this.deps.createSource ?? defaultSource)(config, logger);
      const payload = await source.getTimeEntries(range, config.userId);

      let rawJsonPath: string | undefined;
      if (config.rawJsonFile) {
        const target = resolveOutputPath(config.rawJsonFile, config.outputDir);
        try {
          await writeRawJson({ time_entries: payload.time_entries }, target);
          rawJsonPath = target;
          logger.info(`Saved raw JSON to ${target}`);
        } catch (error) {
          logger.error(`Error saving JSON to ${target}: ${describeError(error)}`);
        }
      }

      operation = 'normalize';
      const columns = columnsFor(config.report.advanced);
      const normalized = normalizeEntries(payload.time_entries, { advanced: config.report.advanced, logger });
      const rows: OutputRow[] = [...normalized.rows];
      if (config.report.summary) {
        rows.push(...buildSummaryRows(normalized.rows, columns, config.report.summaryTasks));
      }
      if (config.report.resume) {
        rows.push(...buildResumeRows(normalized.rows, columns));
      }

      operation = 'write';
      const csvPath = resolveOutputPath(config.csvFile, config.outputDir);
      await writeCsv(rows, csvPath, columns);
      logger.info(`Successfully wrote ${rows.length} rows to ${csvPath}`);
      return { payload, normalized, csvPath, rawJsonPath };
    } catch (error) {
      if (error instanceof HarvestRequestError) {
        throw error;
      }
      throw new ExportStepError(operation, range, error instanceof Error ? error : new Error(describeError(error)));
    }
  }

  private async upload(config: IdentityConfig, csvPath: string, logger: Logger): Promise<void> {
    const { target, credentials, missing } = config.upload;
    if (!target || !credentials || missing.length > 0) {
      throw new ConfigurationError('Google Sheets upload is enabled but not configured', missing);
    }
    const client = (this.deps.createSpreadsheetClient ?? defaultSpreadsheetClient)(credentials);
    logger.info('Google Sheets upload: enabled', { spreadsheetId: target.spreadsheetId, tab: target.tabName });
    await new SheetsUploader(client, logger).upload(csvPath, target);
  }
}

/**
 * Exports each identity in turn. A failing identity is logged and the loop
 * carries on with the next one.
 */
export async function runIdentities(
  prefixes: readonly string[],
  env: Env,
  overrides: CliOverrides,
  deps: PipelineDependencies
): Promise<IdentityOutcome[]> {
  const pipeline = new ExportPipeline(deps);
  const outcomes: IdentityOutcome[] = [];

  for (const prefix of prefixes) {
    const identity = identityLabel(prefix);
    const logger = deps.logger.child({ identity });
    try {
      const config = loadIdentityConfig(prefix, env, overrides, logger);
      const result = await pipeline.run(config, overrides);
      outcomes.push({ identity, ok: true, result });
    } catch (error) {
      const failure =
        error instanceof ExportStepError ? error.error : error instanceof Error ? error : new Error(describeError(error));
      const context =
        error instanceof ExportStepError
          ? { operation: error.operation, from: error.range.from, to: error.range.to }
          : failure instanceof HarvestRequestError
            ? { operation: 'fetch', from: failure.range.from, to: failure.range.to, page: failure.page }
            : failure instanceof ConfigurationError
              ? { operation: 'configure' }
              : { operation: 'export' };
      logger.error(`Export failed: ${failure.message}`, context);
      outcomes.push({ identity, ok: false, error: failure });
    }
  }

  return outcomes;
}
