import { differenceInCalendarDays, isAfter, isValid, parseISO, startOfDay } from "date-fns";

export const CURRENCY_SYMBOL = "₹";

const wholeNumber = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** Compact rupee amount: ₹2.5Cr, ₹1.2L, ₹4.5K, ₹950. */
export function formatCurrency(amount: number): string {
  if (amount >= 10_000_000) return `${CURRENCY_SYMBOL}${(amount / 10_000_000).toFixed(1)}Cr`;
  if (amount >= 100_000) return `${CURRENCY_SYMBOL}${(amount / 100_000).toFixed(1)}L`;
  if (amount >= 1_000) return `${CURRENCY_SYMBOL}${(amount / 1_000).toFixed(1)}K`;
  return `${CURRENCY_SYMBOL}${amount.toFixed(0)}`;
}

/** Full rupee amount with thousands separators and no decimals: ₹12,500. */
export function formatAmount(amount: number): string {
  return `${CURRENCY_SYMBOL}${wholeNumber.format(amount)}`;
}

/** 1.5M, 12.0K, 950 */
export function formatNumber(value: number): string {
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
  return String(Math.trunc(value));
}

/** Percent change from `previous` to `current`; growth from zero counts as 100. */
export function calculateGrowthRate(current: number, previous: number): number {
  if (previous === 0) return current > 0 ? 100 : 0;
  return ((current - previous) / previous) * 100;
}

export type DateRangeCheck = { valid: true } | { valid: false; reason: string };

export const MAX_RANGE_DAYS = 365;

/** Checks a user-picked reporting window against `today`. */
export function validateDateRange(start: string, end: string, today: Date = new Date()): DateRangeCheck {
  const from = parseISO(start);
  const to = parseISO(end);
  if (!isValid(from) || !isValid(to)) return { valid: false, reason: "Dates must be ISO calendar dates" };
  if (isAfter(from, to)) return { valid: false, reason: "Start date cannot be after end date" };
  if (differenceInCalendarDays(to, from) > MAX_RANGE_DAYS) {
    return { valid: false, reason: `Date range cannot exceed ${MAX_RANGE_DAYS} days` };
  }
  if (isAfter(to, startOfDay(today))) return { valid: false, reason: "End date cannot be in the future" };
  return { valid: true };
}
