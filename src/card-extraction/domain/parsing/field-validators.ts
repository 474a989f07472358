/**
 * Field Validators
 *
 * Acceptance predicates shared by the record parser (to reject a value at
 * extraction time) and the record validator (to report on a whole record).
 */

export const MIN_AGE_EXCLUSIVE = 0;
export const MAX_AGE_EXCLUSIVE = 120;
export const MIN_KEBELE = 1;
export const MAX_KEBELE = 17;
export const DAYS_PER_MONTH = 30;
export const MONTHS_PER_YEAR = 13;
export const PAGUME_MAX_DAYS = 6;

const COMPOUND_AGE =
  /^\d+\s*(?:years?|yrs?|y)(?:\s+\d+\s*(?:months?|mos?|m))?$|^\d+\s*(?:months?|mos?)(?:\s+\d+\s*(?:days?|d))?$|^\d+\s*(?:days?|d)$/i;

export function countNameTokens(value: string): number {
  return value.trim().split(/\s+/).filter(Boolean).length;
}

export function isValidPatientName(value: string): boolean {
  return value.trim().length > 0;
}

export function isValidAgeNumber(value: string): boolean {
  if (!/^\d+$/.test(value)) {
    return false;
  }
  const age = parseInt(value, 10);
  return age > MIN_AGE_EXCLUSIVE && age < MAX_AGE_EXCLUSIVE;
}

/** Integer ages in range, or a compound "2 years 3 months" style expression. */
export function isValidAge(value: string): boolean {
  return isValidAgeNumber(value) || COMPOUND_AGE.test(value.trim());
}

export function isValidTelephone(value: string): boolean {
  return /^\d{10}$/.test(value);
}

export function hasTypicalTelephonePrefix(value: string): boolean {
  return value.startsWith('09');
}

export function isValidKebele(value: string): boolean {
  if (!/^\d{2}$/.test(value)) {
    return false;
  }
  const kebele = parseInt(value, 10);
  return kebele >= MIN_KEBELE && kebele <= MAX_KEBELE;
}

export function isValidDayOfMonth(value: string): boolean {
  if (!/^\d{1,2}$/.test(value)) {
    return false;
  }
  const day = parseInt(value, 10);
  return day >= 1 && day <= DAYS_PER_MONTH;
}

/**
 * DD/MM/YYYY on the Ethiopian calendar: twelve 30-day months followed by
 * Pagume, which has 5 or 6 days.
 */
export function isValidEthiopianDate(value: string): boolean {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (!match) {
    return false;
  }

  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);

  if (day < 1 || day > DAYS_PER_MONTH) {
    return false;
  }
  if (month < 1 || month > MONTHS_PER_YEAR) {
    return false;
  }
  if (year < 1000) {
    return false;
  }
  if (month === MONTHS_PER_YEAR && day > PAGUME_MAX_DAYS) {
    return false;
  }
  return true;
}

/** Either a bare day of month or a full Ethiopian calendar date. */
export function isValidRecordDate(value: string): boolean {
  return isValidDayOfMonth(value) || isValidEthiopianDate(value);
}
