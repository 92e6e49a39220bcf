// src/domain/mortgage/config.test.ts
import {
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_PMI_POLICY,
  resolveEngineOptions,
  type EngineOptionsInput,
} from "./config";
import { InvalidLoanError } from "./errors";

describe("resolveEngineOptions", () => {
  test("returns the defaults when nothing is overridden", () => {
    const options = resolveEngineOptions();

    expect(options.pmi).toEqual({
      ltvThreshold: 0.8,
      ltvBasis: "ending-balance",
      removalLag: "next-period",
    });
    expect(options.maxMonths).toBe(1200);
    expect(options.requireHomeValueForPmi).toBe(false);
    expect(options.logger).toBe(DEFAULT_ENGINE_OPTIONS.logger);
  });

  test("merges a partial PMI policy over the defaults", () => {
    const options = resolveEngineOptions({ pmi: { ltvThreshold: 0.78 } });

    expect(options.pmi).toEqual({
      ltvThreshold: 0.78,
      ltvBasis: "ending-balance",
      removalLag: "next-period",
    });
  });

  test("rejects thresholds outside (0, 1]", () => {
    expect(() => resolveEngineOptions({ pmi: { ltvThreshold: 0 } })).toThrow(InvalidLoanError);
    expect(() => resolveEngineOptions({ pmi: { ltvThreshold: 1.2 } })).toThrow(InvalidLoanError);
    expect(() => resolveEngineOptions({ pmi: { ltvThreshold: 1 } })).not.toThrow();
  });

  test("rejects unknown LTV bases and removal lags from untyped callers", () => {
    const badBasis: EngineOptionsInput = JSON.parse('{"pmi":{"ltvBasis":"midpoint"}}');
    const badLag: EngineOptionsInput = JSON.parse('{"pmi":{"removalLag":"never"}}');

    expect(() => resolveEngineOptions(badBasis)).toThrow(
      "PMI LTV basis must be one of ending-balance, beginning-balance, got midpoint"
    );
    expect(() => resolveEngineOptions(badLag)).toThrow(
      "PMI removal lag must be one of next-period, same-period, got never"
    );
    expect(() =>
      resolveEngineOptions({ pmi: { ltvBasis: "beginning-balance", removalLag: "same-period" } })
    ).not.toThrow();
  });

  test("exposes frozen defaults", () => {
    expect(Object.isFrozen(DEFAULT_ENGINE_OPTIONS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PMI_POLICY)).toBe(true);
    expect(DEFAULT_ENGINE_OPTIONS.pmi).toBe(DEFAULT_PMI_POLICY);
  });

  test("returns options callers can change without touching the defaults", () => {
    const options = resolveEngineOptions();
    options.pmi.ltvThreshold = 0.5;
    options.maxMonths = 12;

    expect(DEFAULT_PMI_POLICY.ltvThreshold).toBe(0.8);
    expect(resolveEngineOptions().maxMonths).toBe(1200);
  });

  test("rejects a non-positive or fractional maxMonths", () => {
    expect(() => resolveEngineOptions({ maxMonths: 0 })).toThrow(/maxMonths/);
    expect(() => resolveEngineOptions({ maxMonths: 10.5 })).toThrow(/maxMonths/);
  });
});
