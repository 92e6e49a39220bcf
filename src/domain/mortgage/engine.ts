// src/domain/mortgage/engine.ts
import type {
  Cents,
  LoanTermsInput,
  Money,
  MonthlyEntry,
  PaymentPlanInput,
  ScheduleSummary,
} from "./types";
import { resolveEngineOptions, type EngineOptionsInput } from "./config";
import { InvariantViolation } from "./errors";
import { LoanTerms, levelPaymentCents } from "./loanTerms";
import { PaymentPlan } from "./paymentPlan";
import { createPmiTracker, findPmiDropOff } from "./pmi";
import { fromCents, toCents } from "./money";
import { addMonths, toISOMonth } from "../dateUtils";

export function toLoanTerms(
  loan: LoanTerms | LoanTermsInput,
  options: EngineOptionsInput = {}
): LoanTerms {
  return loan instanceof LoanTerms ? loan : LoanTerms.create(loan, options);
}

export function toPaymentPlan(plan: PaymentPlan | PaymentPlanInput): PaymentPlan {
  return plan instanceof PaymentPlan ? plan : PaymentPlan.create(plan);
}

/**
 * Fixed principal-and-interest payment for the loan.
 */
export function computeLevelPayment(
  loan: LoanTerms | LoanTermsInput,
  options: EngineOptionsInput = {}
): Money {
  return fromCents(levelPaymentCents(toLoanTerms(loan, options)));
}

/**
 * Build the month-by-month amortization schedule for a loan under a payment
 * plan.
 *
 * - Money is carried as integer cents; interest is rounded to the cent as it
 *   accrues.
 * - The level payment is fixed for the life of the loan. In the last
 *   contractual month the remaining balance is settled in full.
 * - Extra principal is clipped so the balance never goes negative.
 * - The schedule ends at payoff, or at `termMonths` for level-payment loans.
 *
 * Throws InvalidLoanError / InvalidPlanError for bad inputs and
 * InvariantViolation when the schedule would exceed `maxMonths`.
 */
export function computeSchedule(
  loanInput: LoanTerms | LoanTermsInput,
  planInput: PaymentPlan | PaymentPlanInput = {},
  optionsInput: EngineOptionsInput = {}
): readonly MonthlyEntry[] {
  const options = resolveEngineOptions(optionsInput);
  const loan = toLoanTerms(loanInput, options);
  const plan = toPaymentPlan(planInput);
  plan.assertFits(loan);

  const knownPayment = loan.monthlyPayment !== null;
  if (!knownPayment && loan.termMonths > options.maxMonths) {
    throw new InvariantViolation(
      `termMonths ${loan.termMonths} exceeds the ${options.maxMonths}-month limit`
    );
  }

  const r = loan.monthlyRate;
  const payment = levelPaymentCents(loan);
  const fixedAddOns: Cents =
    toCents(loan.monthlyTax) +
    toCents(loan.monthlyInsurance) +
    toCents(loan.monthlyHOA);
  const pmiCharge = toCents(loan.monthlyPMI);
  const pmi = createPmiTracker(loan, options.pmi);

  const schedule: MonthlyEntry[] = [];
  let balance = toCents(loan.principal);

  for (let monthIndex = 1; monthIndex <= options.maxMonths; monthIndex++) {
    const interest = Math.round(balance * r);
    const finalContractMonth = !knownPayment && monthIndex === loan.termMonths;

    const scheduledPrincipal = finalContractMonth
      ? balance
      : Math.min(payment - interest, balance);
    if (scheduledPrincipal <= 0) {
      throw new InvariantViolation(
        `payment no longer amortizes the loan in month ${monthIndex}`
      );
    }

    const extra = Math.min(
      plan.extraForMonthCents(monthIndex),
      balance - scheduledPrincipal
    );
    const endingBalance = balance - scheduledPrincipal - extra;

    const pmiActive = pmi.chargeFor(balance, endingBalance);
    const escrowAddOns = fixedAddOns + (pmiActive ? pmiCharge : 0);

    schedule.push(
      Object.freeze({
        monthIndex,
        calendarDate: toISOMonth(addMonths(loan.startMonth, monthIndex - 1)),
        beginningBalance: fromCents(balance),
        scheduledPrincipal: fromCents(scheduledPrincipal),
        scheduledInterest: fromCents(interest),
        extraPrincipal: fromCents(extra),
        endingBalance: fromCents(endingBalance),
        pmiActive,
        escrowAddOns: fromCents(escrowAddOns),
        totalPayment: fromCents(scheduledPrincipal + interest + extra + escrowAddOns),
      })
    );

    balance = endingBalance;
    if (balance <= 0 || finalContractMonth) {
      return Object.freeze(schedule);
    }
  }

  throw new InvariantViolation(
    `loan is not paid off within ${options.maxMonths} months`
  );
}

/**
 * Reduce a schedule to its totals. Sums are taken in cents.
 */
export function summarizeSchedule(
  loan: LoanTerms,
  schedule: readonly MonthlyEntry[]
): ScheduleSummary {
  let interest = 0;
  let principal = 0;
  let extra = 0;
  let escrow = 0;
  let paid = 0;

  for (const e of schedule) {
    interest += toCents(e.scheduledInterest);
    principal += toCents(e.scheduledPrincipal);
    extra += toCents(e.extraPrincipal);
    escrow += toCents(e.escrowAddOns);
    paid += toCents(e.totalPayment);
  }

  const last = schedule.length > 0 ? schedule[schedule.length - 1] : null;

  return {
    months: schedule.length,
    totalInterest: fromCents(interest),
    totalPrincipal: fromCents(principal),
    totalExtra: fromCents(extra),
    totalEscrow: fromCents(escrow),
    totalPaid: fromCents(paid),
    payoffDate: last && last.endingBalance === 0 ? last.calendarDate : null,
    pmiDropOff: findPmiDropOff(loan, schedule),
  };
}
