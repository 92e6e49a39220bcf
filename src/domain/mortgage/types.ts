// src/domain/mortgage/types.ts

export type Money = number;  // dollars, always a whole number of cents
export type Cents = number;  // integer
export type ISOMonth = string; // YYYY-MM

export interface YearMonth {
  year: number;
  month: number; // 1–12
}

/**
 * Raw loan description, as it arrives from a form or a saved scenario.
 * `LoanTerms.create` validates it.
 */
export interface LoanTermsInput {
  principal: Money;
  annualRatePercent: number; // e.g. 6.5 for 6.5%
  termMonths: number;        // e.g. 360
  startMonth: YearMonth | ISOMonth; // month of the first payment
  homeValue?: Money;
  monthlyTax?: Money;
  monthlyInsurance?: Money;
  monthlyHOA?: Money;
  monthlyPMI?: Money;
  // Known P&I payment; replaces the computed level payment.
  monthlyPayment?: Money;
}

export interface OneTimeExtra {
  monthIndex: number; // 1-based
  amount: Money;
}

export interface PaymentPlanInput {
  extraMonthly?: Money;
  effectiveFromMonth?: number;
  oneTimeExtra?: OneTimeExtra | null;
}

// One row of the amortization schedule.
export interface MonthlyEntry {
  readonly monthIndex: number;
  readonly calendarDate: ISOMonth;
  readonly beginningBalance: Money;
  readonly scheduledPrincipal: Money;
  readonly scheduledInterest: Money;
  readonly extraPrincipal: Money;
  readonly endingBalance: Money;
  readonly pmiActive: boolean;
  readonly escrowAddOns: Money;
  readonly totalPayment: Money;
}

export interface PmiDropOff {
  monthIndex: number;
  calendarDate: ISOMonth;
}

export interface ScheduleSummary {
  months: number;
  totalInterest: Money;
  totalPrincipal: Money;
  totalExtra: Money;
  totalEscrow: Money;
  totalPaid: Money;
  payoffDate: ISOMonth | null;
  pmiDropOff: PmiDropOff | null;
}

// Baseline vs scenario.
export interface SavingsSummary {
  monthsShaved: number;
  interestSaved: Money;
  payoffDateBaseline: ISOMonth | null;
  payoffDateScenario: ISOMonth | null;
  baseline: ScheduleSummary;
  scenario: ScheduleSummary;
}

export interface HousingCostBreakdown {
  principalAndInterest: Money;
  taxes: Money;
  insurance: Money;
  hoa: Money;
  pmi: Money;
  totalWithPmi: Money;
  totalWithoutPmi: Money;
}
