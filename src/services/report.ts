import { format, isValid, parse } from 'date-fns';
import { blankRow, type Column, type OutputRow } from '../types/export.js';
import { DATE_FORMAT } from './dateRange.js';

export const DEFAULT_SUMMARY_TASKS: [string, string] = ["OKR's & PDP's", 'Meetings'];
export const RESUME_TITLE = 'RESUME';
export const RESUME_SEPARATOR_ROWS = 3;

const RESUME_DATE_FORMAT = 'EEE MMM d';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function hoursOf(row: OutputRow): number {
  const value = typeof row.Hours === 'number' ? row.Hours : Number(row.Hours);
  return Number.isFinite(value) ? value : 0;
}

function summaryRow(columns: readonly Column[], label: string, total: number): OutputRow {
  return { ...blankRow(columns), Notes: label, Hours: total };
}

/**
 * Totals appended after the entry rows. A total of zero produces no row.
 */
export function buildSummaryRows(
  rows: readonly OutputRow[],
  columns: readonly Column[],
  summaryTasks: readonly string[] = DEFAULT_SUMMARY_TASKS
): OutputRow[] {
  const sum = (predicate: (row: OutputRow) => boolean) =>
    round2(rows.filter(predicate).reduce((total, row) => total + hoursOf(row), 0));

  const totals: Array<[string, number]> = [
    ['TOTAL BILLABLE', sum((row) => row['Billable?'] === 'Yes')],
    ['TOTAL NON BILLABLE', sum((row) => row['Billable?'] !== 'Yes')],
    ...summaryTasks.map((task): [string, number] => [`TOTAL ${task}`, sum((row) => row.Task === task)]),
    ['TOTAL HOURS', sum(() => true)],
  ];

  return totals.filter(([, total]) => total !== 0).map(([label, total]) => summaryRow(columns, label, total));
}

export function formatHoursLabel(hours: number): string {
  const rounded = round2(hours);
  return `${rounded} ${rounded === 1 ? 'HOUR' : 'HOURS'}`;
}

export function formatResumeDate(spentDate: string): string {
  const parsed = parse(spentDate, DATE_FORMAT, new Date());
  return isValid(parsed) ? format(parsed, RESUME_DATE_FORMAT) : spentDate;
}

export function formatResumeLine(row: OutputRow): string {
  const text = (value: string | number) => String(value).replace(/\s*\n\s*/g, ' ').trim();
  const code = text(row['Project Code']);
  const client = text(row.Client);
  const notes = text(row.Notes);

  const segments = [
    `${formatResumeDate(text(row.Date))} >>>`,
    code ? `[${code}]` : '',
    text(row.Project),
    client ? `( ${client} )` : '',
    text(row.Task),
    notes ? `(${notes})` : '',
    `- ${formatHoursLabel(hoursOf(row))}`,
  ];
  return segments.filter((segment) => segment.length > 0).join(' ');
}

/**
 * One multi-line recap of the entries grouped by day, preceded by blank
 * separator rows and a title row.
 */
export function buildResumeRows(rows: readonly OutputRow[], columns: readonly Column[]): OutputRow[] {
  const byDate = new Map<string, OutputRow[]>();
  for (const row of rows) {
    const date = String(row.Date);
    const group = byDate.get(date) ?? [];
    group.push(row);
    byDate.set(date, group);
  }

  const lines = [...byDate.keys()]
    .sort()
    .flatMap((date) => (byDate.get(date) ?? []).map(formatResumeLine));

  const separators = Array.from({ length: RESUME_SEPARATOR_ROWS }, () => blankRow(columns));
  return [
    ...separators,
    { ...blankRow(columns), Date: RESUME_TITLE },
    { ...blankRow(columns), Date: lines.join('\n') },
  ];
}
