/**
 * Field Normalizers
 *
 * Canonicalize raw values before validation. Each normalizer returns the
 * canonical string, or null when the value has no recognisable shape.
 */

export interface DateDefaults {
  month: number;
  year: number;
}

export const CANONICAL_BAHIR_DAR = 'Bahir Dar';

// Spelling variants seen on cards for Bahir Dar; matched case-insensitively
const BAHIR_DAR_ALIASES: RegExp[] = [
  /\bbdr\b/i,
  /\bb\/dar\b/i,
  /\bb\/dr\b/i,
  /\bbahir\s*dar\b/i,
];

export function isBahirDarAlias(value: string): boolean {
  return BAHIR_DAR_ALIASES.some((pattern) => pattern.test(value));
}

export function normalizeAddress(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (isBahirDarAlias(trimmed)) {
    return CANONICAL_BAHIR_DAR;
  }
  return trimmed;
}

export function normalizeWhitespace(value: string): string | null {
  const collapsed = value.trim().replace(/\s+/g, ' ');
  return collapsed.length > 0 ? collapsed : null;
}

export function normalizeAge(value: string): string | null {
  const collapsed = normalizeWhitespace(value);
  if (collapsed === null) {
    return null;
  }
  if (/^\d+$/.test(collapsed)) {
    return String(parseInt(collapsed, 10));
  }
  return collapsed;
}

export function normalizeKebele(value: string): string {
  return value.replace(/\D/g, '');
}

const FULL_DATE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const DAY_MONTH = /^(\d{1,2})[/.-](\d{1,2})$/;
const DAY_ONLY = /^(\d{1,2})$/;

function pad(component: string | number): string {
  return String(component).padStart(2, '0');
}

/**
 * Bring a date into DD/MM/YYYY. Day-only and day/month values are completed
 * from the configured defaults rather than from the current date.
 */
export function normalizeDate(
  value: string,
  defaults: DateDefaults,
): string | null {
  const trimmed = value.trim().replace(/\s*([/.-])\s*/g, '$1');

  let match = FULL_DATE.exec(trimmed);
  if (match) {
    return `${pad(match[1])}/${pad(match[2])}/${match[3]}`;
  }

  match = DAY_MONTH.exec(trimmed);
  if (match) {
    return `${pad(match[1])}/${pad(match[2])}/${defaults.year}`;
  }

  match = DAY_ONLY.exec(trimmed);
  if (match) {
    return `${pad(match[1])}/${pad(defaults.month)}/${defaults.year}`;
  }

  return null;
}
