export const BASE_COLUMNS = [
  'Date',
  'Client',
  'Project',
  'Project Code',
  'Task',
  'Notes',
  'Hours',
  'Billable?',
  'Invoiced?',
  'First Name',
  'Last Name',
  'Roles',
  'Employee?',
  'External Reference URL',
  'Harvest ID',
  'Approved',
  'Department',
] as const;

export const ADVANCED_COLUMNS = [
  'Billable Rate',
  'Billable Amount',
  'Rounded Hours',
  'Locked?',
  'Locked Reason',
  'Created At',
  'Updated At',
] as const;

/** Columns holding numbers; the only ones checked for NaN and infinities before upload. */
export const NUMERIC_COLUMNS = ['Hours', 'Billable Rate', 'Billable Amount', 'Rounded Hours'] as const;

export type BaseColumn = (typeof BASE_COLUMNS)[number];
export type AdvancedColumn = (typeof ADVANCED_COLUMNS)[number];
export type Column = BaseColumn | AdvancedColumn;

export type CellValue = string | number;

export type OutputRow = Record<BaseColumn, CellValue> & Partial<Record<AdvancedColumn, CellValue>>;

export interface DateRange {
  from: string;
  to: string;
}

export type DateRangeSource = 'cli' | 'env' | 'default' | 'fallback';

export interface ResolvedDateRange extends DateRange {
  source: DateRangeSource;
}

export function columnsFor(advanced: boolean): Column[] {
  return advanced ? [...BASE_COLUMNS, ...ADVANCED_COLUMNS] : [...BASE_COLUMNS];
}

export function blankRow(columns: readonly Column[]): OutputRow {
  const row: OutputRow = {
    Date: '',
    Client: '',
    Project: '',
    'Project Code': '',
    Task: '',
    Notes: '',
    Hours: '',
    'Billable?': '',
    'Invoiced?': '',
    'First Name': '',
    'Last Name': '',
    Roles: '',
    'Employee?': '',
    'External Reference URL': '',
    'Harvest ID': '',
    Approved: '',
    Department: '',
  };
  for (const column of columns) {
    if (!(column in row)) {
      row[column] = '';
    }
  }
  return row;
}
