// src/domain/mortgage/errors.ts

/**
 * Raised while constructing `LoanTerms` (or resolving engine options) from
 * values that break a loan invariant. Nothing has been computed yet.
 */
export class InvalidLoanError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidLoanError";
    this.field = field;
  }
}

/**
 * Raised for a malformed payment plan: negative amounts or a month index
 * outside the loan term.
 */
export class InvalidPlanError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidPlanError";
    this.field = field;
  }
}

// Internal defect guard. Never shown to a user as a recoverable condition.
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}
