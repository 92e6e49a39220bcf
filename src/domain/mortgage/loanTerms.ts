// src/domain/mortgage/loanTerms.ts
import type { Cents, LoanTermsInput, Money, YearMonth } from "./types";
import { InvalidLoanError } from "./errors";
import { resolveEngineOptions, type EngineOptionsInput } from "./config";
import { ceilCents, fromCents, toCents } from "./money";
import { isValidYearMonth, parseISOMonth } from "../dateUtils";

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function requireAmount(
  field: string,
  value: unknown,
  { allowZero }: { allowZero: boolean }
): Cents {
  if (!isFiniteNumber(value)) {
    throw new InvalidLoanError(field, `${field} must be a finite number`);
  }
  const cents = toCents(value);
  if (cents < 0 || (!allowZero && cents === 0)) {
    throw new InvalidLoanError(
      field,
      `${field} must be ${allowZero ? "non-negative" : "positive"}, got ${value}`
    );
  }
  return cents;
}

function optionalAddOn(field: string, value: unknown): Cents {
  return value === undefined ? 0 : requireAmount(field, value, { allowZero: true });
}

interface LoanTermsFields {
  principal: Money;
  annualRatePercent: number;
  termMonths: number;
  startMonth: YearMonth;
  homeValue: Money | null;
  monthlyTax: Money;
  monthlyInsurance: Money;
  monthlyHOA: Money;
  monthlyPMI: Money;
  monthlyPayment: Money | null;
  warnings: string[];
}

/**
 * Validated, immutable description of a fixed-rate loan.
 *
 * Instances only come from `LoanTerms.create`, so every value in circulation
 * satisfies the loan invariants. Amounts are normalized to whole cents.
 */
export class LoanTerms {
  readonly principal: Money;
  readonly annualRatePercent: number;
  readonly termMonths: number;
  readonly startMonth: Readonly<YearMonth>;
  readonly homeValue: Money | null;
  readonly monthlyTax: Money;
  readonly monthlyInsurance: Money;
  readonly monthlyHOA: Money;
  readonly monthlyPMI: Money;
  readonly monthlyPayment: Money | null;
  readonly warnings: readonly string[];

  private constructor(fields: LoanTermsFields) {
    this.principal = fields.principal;
    this.annualRatePercent = fields.annualRatePercent;
    this.termMonths = fields.termMonths;
    this.startMonth = Object.freeze({ ...fields.startMonth });
    this.homeValue = fields.homeValue;
    this.monthlyTax = fields.monthlyTax;
    this.monthlyInsurance = fields.monthlyInsurance;
    this.monthlyHOA = fields.monthlyHOA;
    this.monthlyPMI = fields.monthlyPMI;
    this.monthlyPayment = fields.monthlyPayment;
    this.warnings = Object.freeze([...fields.warnings]);
    Object.freeze(this);
  }

  static create(
    input: LoanTermsInput,
    options: EngineOptionsInput = {}
  ): LoanTerms {
    const { requireHomeValueForPmi, logger } = resolveEngineOptions(options);

    const principal = requireAmount("principal", input.principal, {
      allowZero: false,
    });

    const { annualRatePercent, termMonths } = input;
    if (!isFiniteNumber(annualRatePercent) || annualRatePercent < 0) {
      throw new InvalidLoanError(
        "annualRatePercent",
        `annualRatePercent must be a non-negative number, got ${annualRatePercent}`
      );
    }
    if (!Number.isInteger(termMonths) || termMonths <= 0) {
      throw new InvalidLoanError(
        "termMonths",
        `termMonths must be a positive integer, got ${termMonths}`
      );
    }
    const startMonth =
      typeof input.startMonth === "string"
        ? parseISOMonth(input.startMonth)
        : input.startMonth;
    if (!startMonth || !isValidYearMonth(startMonth)) {
      throw new InvalidLoanError(
        "startMonth",
        "startMonth must be \"YYYY-MM\" or a { year, month } pair with month 1-12"
      );
    }

    const homeValue =
      input.homeValue === undefined
        ? null
        : requireAmount("homeValue", input.homeValue, { allowZero: false });

    const monthlyPMI = optionalAddOn("monthlyPMI", input.monthlyPMI);

    let monthlyPayment: Cents | null = null;
    if (input.monthlyPayment !== undefined) {
      monthlyPayment = requireAmount("monthlyPayment", input.monthlyPayment, {
        allowZero: false,
      });
      const firstInterest = Math.round(
        principal * monthlyRateOf(annualRatePercent)
      );
      if (monthlyPayment <= firstInterest) {
        throw new InvalidLoanError(
          "monthlyPayment",
          "monthlyPayment does not cover the first month's interest"
        );
      }
    }

    const warnings: string[] = [];
    if (monthlyPMI > 0 && (homeValue === null || homeValue < principal)) {
      const message =
        homeValue === null
          ? "monthlyPMI is set but homeValue is missing; PMI will be charged for the life of the loan"
          : "homeValue is below principal; PMI will be charged for the life of the loan";
      if (requireHomeValueForPmi) {
        throw new InvalidLoanError("homeValue", message);
      }
      warnings.push(message);
      logger.warn(`[mortgage] ${message}`);
    }

    return new LoanTerms({
      principal: fromCents(principal),
      annualRatePercent,
      termMonths,
      startMonth,
      homeValue: homeValue === null ? null : fromCents(homeValue),
      monthlyTax: fromCents(optionalAddOn("monthlyTax", input.monthlyTax)),
      monthlyInsurance: fromCents(
        optionalAddOn("monthlyInsurance", input.monthlyInsurance)
      ),
      monthlyHOA: fromCents(optionalAddOn("monthlyHOA", input.monthlyHOA)),
      monthlyPMI: fromCents(monthlyPMI),
      monthlyPayment: monthlyPayment === null ? null : fromCents(monthlyPayment),
      warnings,
    });
  }

  get monthlyRate(): number {
    return monthlyRateOf(this.annualRatePercent);
  }

  // PMI can only come off when LTV is measurable against a home worth at
  // least the loan.
  get canEvaluatePmiDrop(): boolean {
    return (
      this.monthlyPMI > 0 &&
      this.homeValue !== null &&
      this.homeValue >= this.principal
    );
  }
}

function monthlyRateOf(annualRatePercent: number): number {
  return annualRatePercent / 100 / 12;
}

/**
 * Level principal-and-interest payment in cents: the borrower-supplied
 * payment when there is one, otherwise the annuity payment rounded up to
 * the next cent.
 */
export function levelPaymentCents(loan: LoanTerms): Cents {
  if (loan.monthlyPayment !== null) {
    return toCents(loan.monthlyPayment);
  }

  const principal = toCents(loan.principal);
  const n = loan.termMonths;
  const r = loan.monthlyRate;

  if (r === 0) {
    return ceilCents(principal / n);
  }

  // At high rates over long terms the annuity can round onto the first
  // month's interest; the payment must retire at least one cent.
  const annuity = ceilCents((principal * r) / (1 - Math.pow(1 + r, -n)));
  return Math.max(annuity, Math.round(principal * r) + 1);
}
