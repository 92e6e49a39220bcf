// src/domain/mortgage/housingCost.ts
import type { HousingCostBreakdown, LoanTermsInput } from "./types";
import type { LoanTerms } from "./loanTerms";
import { levelPaymentCents } from "./loanTerms";
import type { EngineOptionsInput } from "./config";
import { toLoanTerms } from "./engine";
import { fromCents, toCents } from "./money";

/**
 * Monthly housing cost: principal and interest plus the escrow add-ons,
 * with and without PMI.
 */
export function computeHousingCost(
  loanInput: LoanTerms | LoanTermsInput,
  options: EngineOptionsInput = {}
): HousingCostBreakdown {
  const loan = toLoanTerms(loanInput, options);

  const principalAndInterest = levelPaymentCents(loan);
  const taxes = toCents(loan.monthlyTax);
  const insurance = toCents(loan.monthlyInsurance);
  const hoa = toCents(loan.monthlyHOA);
  const pmi = toCents(loan.monthlyPMI);
  const withoutPmi = principalAndInterest + taxes + insurance + hoa;

  return {
    principalAndInterest: fromCents(principalAndInterest),
    taxes: fromCents(taxes),
    insurance: fromCents(insurance),
    hoa: fromCents(hoa),
    pmi: fromCents(pmi),
    totalWithPmi: fromCents(withoutPmi + pmi),
    totalWithoutPmi: fromCents(withoutPmi),
  };
}
