import type { PostProcess } from './FieldSpec';

const MAX_DECIMAL_SEPARATOR_LENGTH = 2;
const MIN_DECIMAL_SEPARATOR_LENGTH = 1;
const EUROPEAN_THOUSANDS_DIGITS = 3;
const TWO_DIGIT_YEAR_BASE = 1900;
const TWO_DIGIT_YEAR_PIVOT = 1950;

const MONTH_FIRST_DATE = /^(\d{1,2})([/-])(\d{1,2})\2(\d{4}|\d{2})$/;
const YEAR_FIRST_DATE = /^(\d{4})([/-])(\d{1,2})\2(\d{1,2})$/;

const LOWERCASE_TITLE_WORDS = new Set(['and', 'of', 'the', 'in', 'on', 'at', 'to', 'for', 'with']);

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Parses `m/d/Y`, `m-d-Y`, `m/d/y`, `m-d-y`, `Y/m/d` and `Y-m-d` into an
 * ISO calendar date. Two-digit years before 50 land in the 2000s.
 */
export function parseDate(raw: string): string | null {
  const value = raw.trim();

  const yearFirst = YEAR_FIRST_DATE.exec(value);
  if (yearFirst) {
    return toIsoDate(Number(yearFirst[1]), Number(yearFirst[3]), Number(yearFirst[4]));
  }

  const monthFirst = MONTH_FIRST_DATE.exec(value);
  if (!monthFirst) {
    return null;
  }

  let year = Number(monthFirst[4]);
  if (monthFirst[4].length === 2) {
    year += TWO_DIGIT_YEAR_BASE;
    if (year < TWO_DIGIT_YEAR_PIVOT) {
      year += 100;
    }
  }

  return toIsoDate(year, Number(monthFirst[1]), Number(monthFirst[3]));
}

/** Whole days from `now` until an ISO date, negative when it has passed. */
export function daysUntil(isoDate: string, now: Date): number {
  const [year, month, day] = isoDate.split('-').map(Number);
  return (Date.UTC(year, month - 1, day) - now.getTime()) / 86_400_000;
}

/** Reads US and European formatted amounts; currency symbols are ignored. */
export function parseAmount(raw: string): number | null {
  let cleaned = raw.trim();

  if (cleaned === '') {
    return null;
  }

  cleaned = cleaned.replace(/[$€£¥\s]/g, '');

  const hasComma = cleaned.includes(',');
  const hasPeriod = cleaned.includes('.');
  const lastCommaIndex = cleaned.lastIndexOf(',');
  const lastPeriodIndex = cleaned.lastIndexOf('.');

  if (hasComma && hasPeriod) {
    if (lastCommaIndex > lastPeriodIndex) {
      cleaned = cleaned.replace(/\./g, '').replace(',', '.');
    } else {
      cleaned = cleaned.replace(/,/g, '');
    }
  } else if (hasComma) {
    const afterComma = cleaned.substring(lastCommaIndex + 1);
    const commaCount = (cleaned.match(/,/g) ?? []).length;
    if (commaCount === 1 && afterComma.length <= MAX_DECIMAL_SEPARATOR_LENGTH) {
      cleaned = cleaned.replace(',', '.');
    } else {
      cleaned = cleaned.replace(/,/g, '');
    }
  } else if (hasPeriod) {
    const parts = cleaned.split('.');
    if (parts.length > 2) {
      const afterLastPeriod = parts[parts.length - 1];
      const groupedThousands =
        parts.slice(1).every((part) => part.length === EUROPEAN_THOUSANDS_DIGITS) &&
        parts[0].length >= MIN_DECIMAL_SEPARATOR_LENGTH &&
        parts[0].length <= EUROPEAN_THOUSANDS_DIGITS;

      cleaned = groupedThousands
        ? parts.join('')
        : `${parts.slice(0, -1).join('')}.${afterLastPeriod}`;
    }
  }

  if (!/^\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }

  const parsed = parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

const UNIT_MULTIPLIERS: Record<string, number> = {
  m: 1_000_000,
  million: 1_000_000,
  k: 1_000,
  thousand: 1_000,
};

export function toCents(amount: string, unit?: string): number | null {
  const value = parseAmount(amount);
  if (value === null) {
    return null;
  }

  const multiplier = unit ? UNIT_MULTIPLIERS[unit.toLowerCase()] ?? 1 : 1;
  return Math.round(value * multiplier * 100);
}

export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/[a-z]+/g, (word) => word[0].toUpperCase() + word.slice(1));
}

/** Title case that keeps short connecting words lower-case after the first word. */
export function toHeadlineCase(value: string): string {
  return collapseWhitespace(value)
    .toLowerCase()
    .split(' ')
    .map((word, index) =>
      index > 0 && LOWERCASE_TITLE_WORDS.has(word) ? word : word.charAt(0).toUpperCase() + word.slice(1)
    )
    .join(' ');
}

// ============================================================
// Post-processors
// ============================================================

export const asText: PostProcess = (match) => {
  const value = collapseWhitespace(match.text);
  return value === '' ? null : value;
};

export const asDate: PostProcess = (match) => parseDate(match.text);

export const asFlag: PostProcess = () => true;

export const asUpperCase: PostProcess = (match) => {
  const value = collapseWhitespace(match.text).toUpperCase();
  return value === '' ? null : value;
};

/** Cents from group 1 with an optional unit word in group 2. */
export function asCents(minDollars = 0): PostProcess {
  return (match) => {
    const cents = toCents(match.groups[0] ?? match.text, match.groups[1]);
    return cents !== null && cents >= minDollars * 100 ? cents : null;
  };
}
