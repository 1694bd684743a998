import { PeppolValidationError } from '../errors';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a date as YYYY-MM-DD on its local calendar day.
 * Strings already in that form are passed through.
 */
export function formatDate(date: string | Date): string {
  if (typeof date === 'string') {
    if (ISO_DATE_PATTERN.test(date)) {
      return date;
    }
    return formatDate(parseDate(date));
  }

  if (Number.isNaN(date.getTime())) {
    throw new PeppolValidationError('Invalid date');
  }

  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** Calendar-day arithmetic in local time, the time of day is kept */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
}

function parseDate(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new PeppolValidationError(`Invalid date: "${value}"`);
  }
  return parsed;
}
