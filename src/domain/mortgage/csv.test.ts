// src/domain/mortgage/csv.test.ts
import { describe, it, expect } from "vitest";
import { computeSchedule } from "./engine";
import { SCHEDULE_CSV_COLUMNS, toScheduleCsv } from "./csv";

describe("toScheduleCsv", () => {
  const schedule = computeSchedule(
    {
      principal: 12_000,
      annualRatePercent: 0,
      termMonths: 12,
      startMonth: { year: 2025, month: 1 },
      homeValue: 14_000,
      monthlyPMI: 40,
      monthlyTax: 200,
    },
    {}
  );

  it("writes the header in the fixed column order", () => {
    const [header] = toScheduleCsv(schedule).split("\n");

    expect(header).toBe(
      "Month,Date,Beginning Balance,Scheduled Principal,Scheduled Interest,Extra Principal,Ending Balance,PMI Active,Escrow Add-ons,Total Payment"
    );
    expect(header.split(",")).toHaveLength(SCHEDULE_CSV_COLUMNS.length);
  });

  it("writes one row per month with two-decimal amounts", () => {
    const lines = toScheduleCsv(schedule).split("\n");

    expect(lines).toHaveLength(13);
    // 11 000 / 14 000 is under 80%: PMI charged in month 1 only.
    expect(lines[1]).toBe("1,2025-01,12000.00,1000.00,0.00,0.00,11000.00,true,240.00,1240.00");
    expect(lines[2]).toBe("2,2025-02,11000.00,1000.00,0.00,0.00,10000.00,false,200.00,1200.00");
    expect(lines[12]).toBe("12,2025-12,1000.00,1000.00,0.00,0.00,0.00,false,200.00,1200.00");
  });

  it("writes only the header for an empty schedule", () => {
    expect(toScheduleCsv([])).toBe(SCHEDULE_CSV_COLUMNS.join(","));
  });
});
