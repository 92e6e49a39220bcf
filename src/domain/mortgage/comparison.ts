// src/domain/mortgage/comparison.ts
import type {
  LoanTermsInput,
  PaymentPlanInput,
  SavingsSummary,
} from "./types";
import type { LoanTerms } from "./loanTerms";
import type { PaymentPlan } from "./paymentPlan";
import { resolveEngineOptions, type EngineOptionsInput } from "./config";
import { computeSchedule, summarizeSchedule, toLoanTerms } from "./engine";
import { InvariantViolation } from "./errors";
import { fromCents, toCents } from "./money";

/**
 * Compare a baseline plan (usually no extra payments) with a scenario plan
 * on the same loan.
 *
 * Extra payments can only lower the balance path, so a scenario with at
 * least the baseline's extras never costs more interest or takes longer.
 * A negative saving therefore means a defect and raises InvariantViolation.
 */
export function compareSchedules(
  loanInput: LoanTerms | LoanTermsInput,
  baselinePlan: PaymentPlan | PaymentPlanInput,
  scenarioPlan: PaymentPlan | PaymentPlanInput,
  optionsInput: EngineOptionsInput = {}
): SavingsSummary {
  const options = resolveEngineOptions(optionsInput);
  const loan = toLoanTerms(loanInput, options);

  const baseline = summarizeSchedule(
    loan,
    computeSchedule(loan, baselinePlan, options)
  );
  const scenario = summarizeSchedule(
    loan,
    computeSchedule(loan, scenarioPlan, options)
  );

  const monthsShaved = baseline.months - scenario.months;
  const interestSavedCents =
    toCents(baseline.totalInterest) - toCents(scenario.totalInterest);

  if (monthsShaved < 0 || interestSavedCents < 0) {
    throw new InvariantViolation(
      `scenario is worse than baseline (months shaved ${monthsShaved}, interest saved ${fromCents(interestSavedCents)})`
    );
  }

  return {
    monthsShaved,
    interestSaved: fromCents(interestSavedCents),
    payoffDateBaseline: baseline.payoffDate,
    payoffDateScenario: scenario.payoffDate,
    baseline,
    scenario,
  };
}
