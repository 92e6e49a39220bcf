// src/domain/mortgage/pmi.ts
import type { Cents, MonthlyEntry, PmiDropOff } from "./types";
import type { PmiPolicy } from "./config";
import type { LoanTerms } from "./loanTerms";
import { toCents } from "./money";

export interface PmiTracker {
  /**
   * Decide whether PMI is charged for one period, given the balance before
   * and after that period's payment. Must be called once per period, in
   * month order.
   */
  chargeFor(beginningBalance: Cents, endingBalance: Cents): boolean;
}

/**
 * Per-schedule PMI state. Without a usable home value (missing, or below
 * the principal) PMI is charged for the life of the loan.
 */
export function createPmiTracker(loan: LoanTerms, policy: PmiPolicy): PmiTracker {
  if (loan.monthlyPMI <= 0) {
    return { chargeFor: () => false };
  }
  if (!loan.canEvaluatePmiDrop || loan.homeValue === null) {
    return { chargeFor: () => true };
  }

  const homeValue = toCents(loan.homeValue);
  let removed = false;

  return {
    chargeFor(beginningBalance, endingBalance) {
      if (removed) return false;

      const basis =
        policy.ltvBasis === "ending-balance" ? endingBalance : beginningBalance;
      const crossed = basis / homeValue <= policy.ltvThreshold;
      if (!crossed) return true;

      removed = true;
      // With the default lag the crossing period is still charged.
      return policy.removalLag === "next-period";
    },
  };
}

/**
 * First period of a schedule in which PMI is no longer charged, or null if
 * PMI never applied or stayed on until payoff.
 */
export function findPmiDropOff(
  loan: LoanTerms,
  schedule: readonly MonthlyEntry[]
): PmiDropOff | null {
  if (loan.monthlyPMI <= 0) return null;
  const entry = schedule.find((e) => !e.pmiActive);
  return entry
    ? { monthIndex: entry.monthIndex, calendarDate: entry.calendarDate }
    : null;
}
