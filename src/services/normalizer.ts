import type { OutputRow } from '../types/export.js';
import type { TimeEntry } from '../types/harvest.js';
import type { Logger } from './logger.js';
import { parseTimeEntry } from './validation.js';

export const DEFAULT_ROLE = 'Developer';

export interface NormalizeOptions {
  advanced: boolean;
  logger: Logger;
}

export interface NormalizeResult {
  rows: OutputRow[];
  skipped: number;
}

function yesNo(flag: boolean | null | undefined): string {
  return flag ? 'Yes' : 'No';
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function splitFullName(fullName: string | null | undefined): { firstName: string; lastName: string } {
  const parts = (fullName ?? '').split(/\s+/).filter((part) => part.length > 0);
  return {
    firstName: parts[0] ?? '',
    lastName: parts.slice(1).join(' '),
  };
}

export function toOutputRow(entry: TimeEntry, advanced: boolean): OutputRow {
  const { firstName, lastName } = splitFullName(entry.user?.name);
  const hours = entry.hours ?? 0;

  const row: OutputRow = {
    Date: entry.spent_date ?? '',
    Client: entry.client?.name ?? '',
    Project: entry.project?.name ?? '',
    'Project Code': entry.project?.code ?? '',
    Task: entry.task?.name ?? '',
    Notes: entry.notes ?? '',
    Hours: hours,
    'Billable?': yesNo(entry.billable),
    'Invoiced?': yesNo(entry.is_billed),
    'First Name': firstName,
    'Last Name': lastName,
    Roles: DEFAULT_ROLE,
    'Employee?': yesNo(entry.user_assignment?.is_active),
    'External Reference URL': entry.external_reference?.permalink ?? '',
    'Harvest ID': String(entry.id),
    // Locked entries are the ones a manager has approved.
    Approved: yesNo(entry.is_locked),
    Department: '',
  };

  if (advanced) {
    const rate = entry.billable_rate;
    row['Billable Rate'] = rate ?? '';
    row['Billable Amount'] = rate != null && entry.hours != null ? roundTo(rate * entry.hours, 2) : '';
    row['Rounded Hours'] = entry.rounded_hours ?? hours;
    row['Locked?'] = yesNo(entry.is_locked);
    row['Locked Reason'] = entry.locked_reason ?? '';
    row['Created At'] = entry.created_at ?? '';
    row['Updated At'] = entry.updated_at ?? '';
  }

  return row;
}

/**
 * Maps raw API entries to output rows. Entries that fail validation are
 * logged and left out; the rest are kept in fetch order.
 */
export function normalizeEntries(rawEntries: readonly unknown[], options: NormalizeOptions): NormalizeResult {
  const rows: OutputRow[] = [];
  let skipped = 0;

  rawEntries.forEach((raw, index) => {
    const parsed = parseTimeEntry(raw);
    if (!parsed.success) {
      skipped += 1;
      options.logger.error(`Error processing entry at position ${index}: ${parsed.error.message}`, {
        issues: parsed.error.issues,
      });
      return;
    }
    rows.push(toOutputRow(parsed.data, options.advanced));
  });

  options.logger.info(`Normalized ${rows.length} time entries`, skipped > 0 ? { skipped } : undefined);
  return { rows, skipped };
}
