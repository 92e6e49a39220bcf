// src/components/MortgagePayoffPanel.tsx
//
// Results view for the payoff calculator. Takes the loan and plan as
// props (the form that collects them lives elsewhere), runs the
// engine against a no-extra baseline and shows payoff, savings, the
// PMI drop-off month and the full amortization schedule.

import { useMemo, type ReactNode } from "react";
import {
  compareSchedules,
  computeHousingCost,
  computeSchedule,
  InvalidLoanError,
  InvalidPlanError,
  LoanTerms,
  PaymentPlan,
  resolveEngineOptions,
  SCHEDULE_CSV_COLUMNS,
  summarizeSchedule,
} from "../domain/mortgage";
import type {
  EngineOptionsInput,
  HousingCostBreakdown,
  LoanTermsInput,
  MonthlyEntry,
  PaymentPlanInput,
  SavingsSummary,
  ScheduleSummary,
} from "../domain/mortgage";
import { formatMonth } from "../utils/dates";

// Format a dollar amount with cents, e.g. 1234.5 → "$1,234.50".
function formatCurrency(value: number): string {
  return value.toLocaleString("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

// 34 → "2 yrs 10 mos". Zero returns an em dash.
function formatMonthsAsYearsMonths(totalMonths: number): string {
  if (!Number.isFinite(totalMonths) || totalMonths <= 0) {
    return "—";
  }
  const years = Math.floor(totalMonths / 12);
  const remainingMonths = totalMonths % 12;

  const parts: string[] = [];
  if (years > 0) {
    parts.push(`${years} yr${years === 1 ? "" : "s"}`);
  }
  if (remainingMonths > 0) {
    parts.push(`${remainingMonths} mo${remainingMonths === 1 ? "" : "s"}`);
  }
  return parts.join(" ");
}

interface Projection {
  loan: LoanTerms;
  schedule: readonly MonthlyEntry[];
  summary: ScheduleSummary;
  savings: SavingsSummary;
  housing: HousingCostBreakdown;
}

type ProjectionState =
  | { ok: true; projection: Projection }
  | { ok: false; message: string };

function project(
  loanInput: LoanTermsInput,
  planInput: PaymentPlanInput,
  optionsInput: EngineOptionsInput
): ProjectionState {
  try {
    const options = resolveEngineOptions(optionsInput);
    const loan = LoanTerms.create(loanInput, options);
    const plan = PaymentPlan.create(planInput);
    const schedule = computeSchedule(loan, plan, options);
    return {
      ok: true,
      projection: {
        loan,
        schedule,
        summary: summarizeSchedule(loan, schedule),
        savings: compareSchedules(loan, PaymentPlan.none(), plan, options),
        housing: computeHousingCost(loan, options),
      },
    };
  } catch (err) {
    // Bad input is shown to the user; anything else is a defect.
    if (err instanceof InvalidLoanError || err instanceof InvalidPlanError) {
      return { ok: false, message: err.message };
    }
    throw err;
  }
}

function Metric({ id, label, value }: { id: string; label: string; value: string }) {
  return (
    <div data-testid={id} style={{ display: "flex", flexDirection: "column", flex: 1 }}>
      <span style={{ fontSize: 11, color: "#a1a1aa", marginBottom: 2 }}>{label}</span>
      <strong style={{ fontSize: 18, color: "#f4f4f5" }}>{value}</strong>
    </div>
  );
}

function SectionCard({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div
      style={{
        borderRadius: 12,
        padding: 16,
        border: "1px solid #27272a",
        backgroundColor: "#09090b",
        marginBottom: 24,
        width: "100%",
      }}
    >
      <h3 style={{ margin: 0, marginBottom: 12, fontSize: 16, fontWeight: 600, color: "#f4f4f5" }}>
        {title}
      </h3>
      <div>{children}</div>
    </div>
  );
}

function ScheduleTable({ schedule }: { schedule: readonly MonthlyEntry[] }) {
  const cell = { padding: "2px 6px", textAlign: "right" as const };
  return (
    <table data-testid="schedule" style={{ width: "100%", fontSize: 11, color: "#e4e4e7" }}>
      <thead>
        <tr>
          {SCHEDULE_CSV_COLUMNS.map((column) => (
            <th key={column} style={cell}>
              {column}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {schedule.map((e) => (
          <tr key={e.monthIndex}>
            <td style={cell}>{e.monthIndex}</td>
            <td style={cell}>{e.calendarDate}</td>
            <td style={cell}>{formatCurrency(e.beginningBalance)}</td>
            <td style={cell}>{formatCurrency(e.scheduledPrincipal)}</td>
            <td style={cell}>{formatCurrency(e.scheduledInterest)}</td>
            <td style={cell}>{formatCurrency(e.extraPrincipal)}</td>
            <td style={cell}>{formatCurrency(e.endingBalance)}</td>
            <td style={cell}>{e.pmiActive ? "Yes" : "No"}</td>
            <td style={cell}>{formatCurrency(e.escrowAddOns)}</td>
            <td style={cell}>{formatCurrency(e.totalPayment)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}

const DEFAULT_OPTIONS: EngineOptionsInput = {};

export interface MortgagePayoffPanelProps {
  loan: LoanTermsInput;
  plan: PaymentPlanInput;
  options?: EngineOptionsInput;
}

export default function MortgagePayoffPanel({
  loan,
  plan,
  options = DEFAULT_OPTIONS,
}: MortgagePayoffPanelProps) {
  const state = useMemo(() => project(loan, plan, options), [loan, plan, options]);

  if (!state.ok) {
    return (
      <div role="alert" style={{ color: "#f87171", fontSize: 12 }}>
        {state.message}
      </div>
    );
  }

  const { projection } = state;
  const { summary, savings, housing } = projection;
  const pmiDropOff = summary.pmiDropOff;

  let pmiMessage: string | null = null;
  if (pmiDropOff) {
    pmiMessage = `PMI drops off in ${formatMonth(pmiDropOff.calendarDate)}, reducing your monthly housing by ${formatCurrency(housing.pmi)}.`;
  } else if (housing.pmi > 0 && !projection.loan.canEvaluatePmiDrop) {
    pmiMessage =
      "Enter a home value at or above the loan balance to estimate when PMI drops off.";
  }

  return (
    <div>
      <SectionCard title="Results">
        <div style={{ display: "flex", gap: 16, marginBottom: 12 }}>
          <Metric id="payment" label="Mortgage P&I" value={formatCurrency(housing.principalAndInterest)} />
          <Metric id="housing" label="Housing (w/ PMI)" value={formatCurrency(housing.totalWithPmi)} />
        </div>
        <div style={{ display: "flex", gap: 16, marginBottom: 12 }}>
          <Metric id="months" label="Payoff (months)" value={summary.months.toLocaleString("en-US")} />
          <Metric id="total-interest" label="Total interest paid" value={formatCurrency(summary.totalInterest)} />
        </div>
        <div style={{ display: "flex", gap: 16, marginBottom: 12 }}>
          <Metric id="interest-saved" label="Interest saved" value={formatCurrency(savings.interestSaved)} />
          <Metric
            id="months-saved"
            label="Time saved"
            value={formatMonthsAsYearsMonths(savings.monthsShaved)}
          />
        </div>
        {pmiMessage && (
          <p data-testid="pmi-message" style={{ fontSize: 12, color: "#4ade80" }}>
            {pmiMessage}
          </p>
        )}
        {summary.payoffDate && (
          <p data-testid="payoff-date" style={{ fontSize: 12, color: "#a1a1aa" }}>
            {`Estimated payoff: ${formatMonth(summary.payoffDate)}`}
          </p>
        )}
        {savings.payoffDateBaseline &&
          savings.payoffDateScenario &&
          savings.payoffDateBaseline !== savings.payoffDateScenario && (
            <p data-testid="payoff-comparison" style={{ fontSize: 12, color: "#a1a1aa" }}>
              {`Original payoff: ${formatMonth(savings.payoffDateBaseline)}. Payoff with extra: ${formatMonth(savings.payoffDateScenario)}.`}
            </p>
          )}
      </SectionCard>
      <SectionCard title="Amortization schedule">
        <ScheduleTable schedule={projection.schedule} />
      </SectionCard>
    </div>
  );
}
