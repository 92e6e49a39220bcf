// src/domain/mortgage/comparison.test.ts
import { describe, it, expect } from "vitest";
import { compareSchedules } from "./comparison";
import { InvariantViolation } from "./errors";
import { PaymentPlan } from "./paymentPlan";
import type { LoanTermsInput, PaymentPlanInput } from "./types";

const terms: LoanTermsInput = {
  principal: 300_000,
  annualRatePercent: 6.5,
  termMonths: 360,
  startMonth: { year: 2025, month: 1 },
};

// Small deterministic PRNG (mulberry32) so failures are reproducible.
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("compareSchedules", () => {
  it("reports interest and months saved by an extra monthly payment", () => {
    const result = compareSchedules(terms, PaymentPlan.none(), { extraMonthly: 200 });

    expect(result.monthsShaved).toBeGreaterThan(0);
    expect(result.interestSaved).toBeGreaterThan(0);
    expect(result.monthsShaved).toBe(result.baseline.months - result.scenario.months);
    expect(result.interestSaved).toBeCloseTo(
      result.baseline.totalInterest - result.scenario.totalInterest,
      2
    );
    const scenarioPayoff = result.scenario.payoffDate;
    const baselinePayoff = result.baseline.payoffDate;
    expect(scenarioPayoff !== null && baselinePayoff !== null && scenarioPayoff < baselinePayoff).toBe(true);
  });

  it("reports zero savings for identical plans", () => {
    const result = compareSchedules(terms, {}, {});

    expect(result.monthsShaved).toBe(0);
    expect(result.interestSaved).toBe(0);
    expect(result.payoffDateScenario).toBe(result.payoffDateBaseline);
  });

  it("counts only principal saved for a zero-rate loan", () => {
    const result = compareSchedules(
      { principal: 12_000, annualRatePercent: 0, termMonths: 12, startMonth: terms.startMonth },
      {},
      { oneTimeExtra: { monthIndex: 6, amount: 3000 } }
    );

    expect(result.interestSaved).toBe(0);
    expect(result.monthsShaved).toBe(3);
    expect(result.payoffDateBaseline).toBe("2025-12");
    expect(result.payoffDateScenario).toBe("2025-09");
  });

  it("fails loudly when the scenario is worse than the baseline", () => {
    expect(() =>
      compareSchedules(terms, { extraMonthly: 200 }, PaymentPlan.none())
    ).toThrow(InvariantViolation);
  });

  it("never reports negative savings for random loans and extra payments", () => {
    const random = seededRandom(20_250_101);
    const pick = (min: number, max: number) =>
      Math.floor(random() * (max - min + 1)) + min;

    for (let i = 0; i < 200; i++) {
      // Every fourth loan is high-rate and long-term.
      const steep = i % 4 === 0;
      const termMonths = steep ? pick(360, 480) : pick(1, 360);
      const loan: LoanTermsInput = {
        principal: pick(1_000, 750_000) + pick(0, 99) / 100,
        annualRatePercent: steep
          ? pick(2000, 3600) / 100
          : random() < 0.1
            ? 0
            : pick(0, 1500) / 100,
        termMonths,
        startMonth: { year: pick(2000, 2030), month: pick(1, 12) },
      };
      const scenario: PaymentPlanInput = {
        extraMonthly: random() < 0.2 ? 0 : pick(0, 300_000) / 100,
        effectiveFromMonth: pick(1, termMonths),
        oneTimeExtra:
          random() < 0.5
            ? { monthIndex: pick(1, termMonths), amount: pick(0, 5_000_000) / 100 }
            : null,
      };

      const result = compareSchedules(loan, PaymentPlan.none(), scenario);

      expect(result.monthsShaved).toBeGreaterThanOrEqual(0);
      expect(result.interestSaved).toBeGreaterThanOrEqual(0);
      expect(result.scenario.months).toBeLessThanOrEqual(termMonths);
    }
  });
});
