// src/domain/mortgage/config.ts
import { InvalidLoanError } from "./errors";

export type LtvBasis = "ending-balance" | "beginning-balance";
export type PmiRemovalLag = "next-period" | "same-period";

/**
 * When mortgage insurance stops being charged.
 *
 * The defaults evaluate loan-to-value on the balance after the period's
 * payment, and keep charging PMI in the period that crosses the threshold;
 * it is removed from the following period onward.
 */
export interface PmiPolicy {
  ltvThreshold: number;
  ltvBasis: LtvBasis;
  removalLag: PmiRemovalLag;
}

export type EngineLogger = Pick<Console, "warn">;

export interface EngineOptions {
  pmi: PmiPolicy;
  // Hard cap on schedule length.
  maxMonths: number;
  // Reject PMI loans without a usable home value instead of warning.
  requireHomeValueForPmi: boolean;
  logger: EngineLogger;
}

export interface EngineOptionsInput {
  pmi?: Partial<PmiPolicy>;
  maxMonths?: number;
  requireHomeValueForPmi?: boolean;
  logger?: EngineLogger;
}

export const DEFAULT_PMI_POLICY: Readonly<PmiPolicy> = Object.freeze({
  ltvThreshold: 0.8,
  ltvBasis: "ending-balance",
  removalLag: "next-period",
});

export const DEFAULT_ENGINE_OPTIONS: Readonly<EngineOptions> = Object.freeze({
  pmi: DEFAULT_PMI_POLICY,
  maxMonths: 1200,
  requireHomeValueForPmi: false,
  logger: console,
});

const LTV_BASES: readonly string[] = [
  "ending-balance",
  "beginning-balance",
] satisfies readonly LtvBasis[];
const REMOVAL_LAGS: readonly string[] = [
  "next-period",
  "same-period",
] satisfies readonly PmiRemovalLag[];

export function resolveEngineOptions(
  input: EngineOptionsInput = {}
): EngineOptions {
  const options: EngineOptions = {
    pmi: { ...DEFAULT_PMI_POLICY, ...input.pmi },
    maxMonths: input.maxMonths ?? DEFAULT_ENGINE_OPTIONS.maxMonths,
    requireHomeValueForPmi:
      input.requireHomeValueForPmi ??
      DEFAULT_ENGINE_OPTIONS.requireHomeValueForPmi,
    logger: input.logger ?? DEFAULT_ENGINE_OPTIONS.logger,
  };

  const { ltvThreshold } = options.pmi;
  if (!Number.isFinite(ltvThreshold) || ltvThreshold <= 0 || ltvThreshold > 1) {
    throw new InvalidLoanError(
      "options",
      `PMI LTV threshold must be in (0, 1], got ${ltvThreshold}`
    );
  }
  const { ltvBasis, removalLag } = options.pmi;
  if (!LTV_BASES.includes(ltvBasis)) {
    throw new InvalidLoanError(
      "options",
      `PMI LTV basis must be one of ${LTV_BASES.join(", ")}, got ${ltvBasis}`
    );
  }
  if (!REMOVAL_LAGS.includes(removalLag)) {
    throw new InvalidLoanError(
      "options",
      `PMI removal lag must be one of ${REMOVAL_LAGS.join(", ")}, got ${removalLag}`
    );
  }
  if (!Number.isInteger(options.maxMonths) || options.maxMonths <= 0) {
    throw new InvalidLoanError(
      "options",
      `maxMonths must be a positive integer, got ${options.maxMonths}`
    );
  }

  return options;
}
