// src/domain/mortgage/csv.ts
import type { MonthlyEntry } from "./types";
import { formatAmount } from "./money";

// Column order is part of the export format; keep it stable.
export const SCHEDULE_CSV_COLUMNS = [
  "Month",
  "Date",
  "Beginning Balance",
  "Scheduled Principal",
  "Scheduled Interest",
  "Extra Principal",
  "Ending Balance",
  "PMI Active",
  "Escrow Add-ons",
  "Total Payment",
] as const;

function toRow(e: MonthlyEntry): string[] {
  return [
    String(e.monthIndex),
    e.calendarDate,
    formatAmount(e.beginningBalance),
    formatAmount(e.scheduledPrincipal),
    formatAmount(e.scheduledInterest),
    formatAmount(e.extraPrincipal),
    formatAmount(e.endingBalance),
    String(e.pmiActive),
    formatAmount(e.escrowAddOns),
    formatAmount(e.totalPayment),
  ];
}

/**
 * Render a schedule as CSV: a header row, then one row per month.
 * No field contains a comma or quote, so nothing is escaped.
 */
export function toScheduleCsv(schedule: readonly MonthlyEntry[]): string {
  return [SCHEDULE_CSV_COLUMNS.join(","), ...schedule.map((e) => toRow(e).join(","))].join(
    "\n"
  );
}
