// src/domain/mortgage/money.ts
import type { Cents, Money } from "./types";

// Tolerance for float noise when snapping a dollar value to whole cents.
const CENT_EPSILON = 1e-9;

export function toCents(amount: Money): Cents {
  return Math.round(amount * 100);
}

export function fromCents(cents: Cents): Money {
  return cents / 100;
}

/**
 * Round a fractional cent count up to the next whole cent. A level payment
 * rounded this way retires the loan within its term.
 */
export function ceilCents(cents: number): Cents {
  return Math.ceil(cents - CENT_EPSILON);
}

export function formatAmount(amount: Money): string {
  return amount.toFixed(2);
}
