// src/domain/mortgage/paymentPlan.ts
import type { Cents, Money, OneTimeExtra, PaymentPlanInput } from "./types";
import { InvalidPlanError } from "./errors";
import { fromCents, toCents } from "./money";
import type { LoanTerms } from "./loanTerms";

function requireExtraAmount(field: string, value: unknown): Cents {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidPlanError(field, `${field} must be a finite number`);
  }
  const cents = toCents(value);
  if (cents < 0) {
    throw new InvalidPlanError(field, `${field} must be non-negative, got ${value}`);
  }
  return cents;
}

function requireMonthIndex(field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new InvalidPlanError(
      field,
      `${field} must be an integer month index >= 1, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Extra-principal strategy: a recurring monthly extra from a given month,
 * an optional one-time lump sum, both, or neither.
 */
export class PaymentPlan {
  readonly extraMonthly: Money;
  readonly effectiveFromMonth: number;
  readonly oneTimeExtra: Readonly<OneTimeExtra> | null;

  private constructor(
    extraMonthly: Money,
    effectiveFromMonth: number,
    oneTimeExtra: OneTimeExtra | null
  ) {
    this.extraMonthly = extraMonthly;
    this.effectiveFromMonth = effectiveFromMonth;
    this.oneTimeExtra = oneTimeExtra ? Object.freeze({ ...oneTimeExtra }) : null;
    Object.freeze(this);
  }

  static create(input: PaymentPlanInput = {}): PaymentPlan {
    const extraMonthly =
      input.extraMonthly === undefined
        ? 0
        : requireExtraAmount("extraMonthly", input.extraMonthly);
    const effectiveFromMonth =
      input.effectiveFromMonth === undefined
        ? 1
        : requireMonthIndex("effectiveFromMonth", input.effectiveFromMonth);

    let oneTimeExtra: OneTimeExtra | null = null;
    if (input.oneTimeExtra) {
      oneTimeExtra = {
        monthIndex: requireMonthIndex(
          "oneTimeExtra.monthIndex",
          input.oneTimeExtra.monthIndex
        ),
        amount: fromCents(
          requireExtraAmount("oneTimeExtra.amount", input.oneTimeExtra.amount)
        ),
      };
    }

    return new PaymentPlan(fromCents(extraMonthly), effectiveFromMonth, oneTimeExtra);
  }

  static none(): PaymentPlan {
    return PaymentPlan.create();
  }

  /**
   * Checks the parts of the plan that depend on the loan it is applied to.
   */
  assertFits(loan: LoanTerms): void {
    if (this.oneTimeExtra && this.oneTimeExtra.monthIndex > loan.termMonths) {
      throw new InvalidPlanError(
        "oneTimeExtra.monthIndex",
        `oneTimeExtra.monthIndex ${this.oneTimeExtra.monthIndex} is outside the ${loan.termMonths}-month term`
      );
    }
  }

  // Requested extra principal for a period, before clipping to the balance.
  extraForMonthCents(monthIndex: number): Cents {
    let extra = monthIndex >= this.effectiveFromMonth ? toCents(this.extraMonthly) : 0;
    if (this.oneTimeExtra && this.oneTimeExtra.monthIndex === monthIndex) {
      extra += toCents(this.oneTimeExtra.amount);
    }
    return extra;
  }
}
