import type { DateRange } from './types/export.js';

export class HarvestSheetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required setting is missing or malformed. `missing` lists the
 * variable names (or fields) that need attention.
 */
export class ConfigurationError extends HarvestSheetError {
  constructor(message: string, readonly missing: string[] = []) {
    super(missing.length > 0 ? `${message}: ${missing.join(', ')}` : message);
  }
}

export class HarvestRequestError extends HarvestSheetError {
  constructor(
    message: string,
    readonly page: number,
    readonly range: DateRange,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PayloadValidationError extends HarvestSheetError {
  constructor(readonly payload: string, readonly issues: string[]) {
    super(`Invalid ${payload}: ${issues.join('; ')}`);
  }
}

export class WriteError extends HarvestSheetError {
  constructor(readonly path: string, cause: unknown) {
    super(`Failed to write ${path}: ${describeError(cause)}`, { cause });
  }
}

export class UploadError extends HarvestSheetError {
  constructor(
    message: string,
    readonly spreadsheetId: string,
    readonly tabName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * A failure after the date range was resolved, tagged with the step that
 * failed. `error` is the underlying failure.
 */
export class ExportStepError extends HarvestSheetError {
  constructor(
    readonly operation: string,
    readonly range: DateRange,
    readonly error: Error,
  ) {
    super(error.message, { cause: error });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'An unknown error occurred';
}
