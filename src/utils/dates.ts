/**
 * Display helpers for calendar months. Schedules carry ISO months
 * (`YYYY-MM`); the UI shows them as "January 2025".
 */

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/**
 * Format an ISO month (YYYY-MM, a trailing day is ignored) as a long
 * month name and year. Unparseable input is returned unchanged; empty
 * input gives an empty string.
 */
export function formatMonth(isoMonth: string | undefined | null): string {
  if (!isoMonth) return "";
  const [year, month] = isoMonth.split("-");
  if (!year || !month) return isoMonth;
  const monthName = MONTH_NAMES[parseInt(month, 10) - 1];
  if (!monthName) return isoMonth;
  return `${monthName} ${year}`;
}
