import { endOfDay, isValid, parse, startOfDay } from 'date-fns';

export const DATE_PARAM_FORMAT = 'yyyy-MM-dd';

const DATE_PARAM_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a YYYY-MM-DD query value as a local calendar day.
 * Returns null for anything else, including impossible days such as 2024-02-30.
 */
export function parseDateParam(value: string): Date | null {
  if (!DATE_PARAM_PATTERN.test(value)) {
    return null;
  }
  const parsed = parse(value, DATE_PARAM_FORMAT, new Date());
  return isValid(parsed) ? parsed : null;
}

export function isDateParam(value: string): boolean {
  return parseDateParam(value) !== null;
}

export interface DateRange {
  from?: Date;
  to?: Date;
}

/**
 * Inclusive bounds for start_date / end_date filters: the start of the first
 * day through the last millisecond of the last day.
 */
export function toDateRange(startDate?: string, endDate?: string): DateRange {
  const range: DateRange = {};
  const start = startDate ? parseDateParam(startDate) : null;
  const end = endDate ? parseDateParam(endDate) : null;

  if (start) {
    range.from = startOfDay(start);
  }
  if (end) {
    range.to = endOfDay(end);
  }
  return range;
}
