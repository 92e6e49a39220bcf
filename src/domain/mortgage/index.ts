// src/domain/mortgage/index.ts
export * from "./types";
export * from "./errors";
export * from "./config";
export { LoanTerms, levelPaymentCents } from "./loanTerms";
export { PaymentPlan } from "./paymentPlan";
export { createPmiTracker, findPmiDropOff, type PmiTracker } from "./pmi";
export {
  computeSchedule,
  computeLevelPayment,
  summarizeSchedule,
  toLoanTerms,
  toPaymentPlan,
} from "./engine";
export { compareSchedules } from "./comparison";
export { computeHousingCost } from "./housingCost";
export { SCHEDULE_CSV_COLUMNS, toScheduleCsv } from "./csv";
export { toCents, fromCents, formatAmount } from "./money";
