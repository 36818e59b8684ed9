import type { ZodError } from 'zod';
import { PayloadValidationError } from '../errors.js';
import {
  TimeEntriesPageSchema,
  TimeEntrySchema,
  type TimeEntriesPage,
  type TimeEntry,
} from '../types/harvest.js';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: PayloadValidationError };

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${field}: ${issue.message}`;
  });
}

export function parseTimeEntry(raw: unknown): ValidationResult<TimeEntry> {
  const result = TimeEntrySchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: new PayloadValidationError('time entry', describeIssues(result.error)) };
}

export function parseTimeEntriesPage(raw: unknown): ValidationResult<TimeEntriesPage> {
  const result = TimeEntriesPageSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: new PayloadValidationError('time entries page', describeIssues(result.error)),
  };
}
