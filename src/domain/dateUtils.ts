// src/domain/dateUtils.ts
import type { ISOMonth, YearMonth } from "./mortgage/types";

/**
 * Shift a calendar month by `offset` months (negative allowed).
 */
export function addMonths(base: YearMonth, offset: number): YearMonth {
  const zeroBased = base.year * 12 + (base.month - 1) + offset;
  return {
    year: Math.floor(zeroBased / 12),
    month: (((zeroBased % 12) + 12) % 12) + 1,
  };
}

/**
 * Format as ISO month "YYYY-MM".
 */
export function toISOMonth(ym: YearMonth): ISOMonth {
  const year = ym.year.toString().padStart(4, "0");
  const month = ym.month.toString().padStart(2, "0");
  return `${year}-${month}`;
}

/**
 * Parse "YYYY-MM" (a trailing "-DD" is ignored). Returns null when the
 * string is not a valid month.
 */
export function parseISOMonth(iso: string): YearMonth | null {
  const match = /^(\d{4})-(\d{2})(?:-\d{2})?$/.exec(iso.trim());
  if (!match) return null;
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  if (month < 1 || month > 12) return null;
  return { year, month };
}

export function isValidYearMonth(value: YearMonth): boolean {
  return (
    Number.isInteger(value.year) &&
    value.year >= 1 &&
    value.year <= 9999 &&
    Number.isInteger(value.month) &&
    value.month >= 1 &&
    value.month <= 12
  );
}
