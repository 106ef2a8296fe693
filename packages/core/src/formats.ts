import type { StringFormat } from '@marquee/shared';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(Z|[+-]\d{2}:\d{2})$/;
const DATE_PART = /^\d+$/;

/**
 * Structural `YYYY-MM-DD` check. Day is only bounded to 1-31; no calendar or
 * leap-year arithmetic.
 */
export function isValidDate(value: string): boolean {
  if (value.length !== 10) return false;

  const parts = value.split('-');
  if (parts.length !== 3 || !parts.every(p => DATE_PART.test(p))) return false;

  const [year, month, day] = parts.map(Number);
  return year >= 1000 && year <= 9999
    && month >= 1 && month <= 12
    && day >= 1 && day <= 31;
}

export function isValidUri(value: string): boolean {
  if (value.length === 0) return false;
  return value.includes('://') || value.startsWith('/') || value.startsWith('mailto:');
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isValidDateTime(value: string): boolean {
  return DATE_TIME_PATTERN.test(value);
}

export const FORMAT_CHECKS: Record<StringFormat, (value: string) => boolean> = {
  'date': isValidDate,
  'uri': isValidUri,
  'email': isValidEmail,
  'date-time': isValidDateTime,
};
