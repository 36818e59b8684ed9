import { addDays, format, isMatch, isValid, startOfWeek, subDays, subWeeks } from 'date-fns';
import { ConfigurationError } from '../errors.js';
import type { DateRange, ResolvedDateRange } from '../types/export.js';
import type { Logger } from './logger.js';

export const DATE_FORMAT = 'yyyy-MM-dd';

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isMatch(value, DATE_FORMAT);
}

export interface DateInput {
  from?: string;
  to?: string;
}

/** Monday-based weekday index: Monday is 0, Sunday is 6. */
export function weekdayIndex(date: Date): number {
  return (date.getDay() + 6) % 7;
}

/**
 * Friday through Sunday report on the week in progress; Monday through
 * Thursday report on the week before.
 */
export function lastWeekRange(today: Date): DateRange {
  const monday = startOfWeek(today, { weekStartsOn: 1 });
  const start = weekdayIndex(today) >= 4 ? monday : subWeeks(monday, 1);
  return {
    from: format(start, DATE_FORMAT),
    to: format(addDays(start, 6), DATE_FORMAT),
  };
}

function checkPair(input: DateInput, fromName: string, toName: string): DateRange | undefined {
  const { from, to } = input;
  if (!from && !to) {
    return undefined;
  }
  if (!from || !to) {
    throw new ConfigurationError(
      `Both ${fromName} and ${toName} must be given together`,
      [from ? toName : fromName]
    );
  }
  const malformed = [
    [fromName, from],
    [toName, to],
  ]
    .filter(([, value]) => !isIsoDate(value))
    .map(([name]) => name);
  if (malformed.length > 0) {
    throw new ConfigurationError('Dates must use YYYY-MM-DD', malformed);
  }
  return { from, to };
}

export function resolveDateRange(
  cli: DateInput,
  env: DateInput,
  logger: Logger,
  clock: () => Date = () => new Date()
): ResolvedDateRange {
  const explicit = checkPair(cli, '--from-date', '--to-date');
  if (explicit) {
    logger.info(`Using --from-date and --to-date arguments: ${explicit.from} to ${explicit.to}`);
    return { ...explicit, source: 'cli' };
  }

  const fromEnv = checkPair(env, 'FROM_DATE', 'TO_DATE');
  if (fromEnv) {
    logger.info(`Using FROM_DATE and TO_DATE from environment: ${fromEnv.from} to ${fromEnv.to}`);
    return { ...fromEnv, source: 'env' };
  }

  let today: Date;
  try {
    today = clock();
    if (!isValid(today)) {
      throw new Error('clock returned an invalid date');
    }
  } catch (error) {
    const end = new Date();
    const range = { from: format(subDays(end, 6), DATE_FORMAT), to: format(end, DATE_FORMAT) };
    logger.warn(`Could not read today's date, using the 7 days ending today: ${range.from} to ${range.to}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { ...range, source: 'fallback' };
  }

  const range = lastWeekRange(today);
  logger.info(`No date range provided, using last week: ${range.from} to ${range.to}`);
  return { ...range, source: 'default' };
}
