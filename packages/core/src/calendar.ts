import type { DateRange, RefreshScope } from "@sessiondex/contracts";

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function startOfDayMs(ms: number): number {
  const date = new Date(ms);
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

export function startOfMonthMs(ms: number): number {
  const date = new Date(ms);
  return new Date(date.getFullYear(), date.getMonth(), 1).getTime();
}

export function addMonthsMs(monthStartMs: number, delta: number): number {
  const date = new Date(monthStartMs);
  return new Date(date.getFullYear(), date.getMonth() + delta, 1).getTime();
}

export function addDaysMs(dayStartMs: number, delta: number): number {
  const date = new Date(dayStartMs);
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + delta).getTime();
}

/** `YYYY-MM` in local time. */
export function monthKey(ms: number): string {
  const date = new Date(ms);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}`;
}

/** `YYYY-MM-DD` in local time. */
export function dayKey(ms: number): string {
  const date = new Date(ms);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function dayOfMonth(ms: number): number {
  return new Date(ms).getDate();
}

export function daysInMonth(monthStartMs: number): number {
  const date = new Date(monthStartMs);
  return new Date(date.getFullYear(), date.getMonth() + 1, 0).getDate();
}

export function isSameDay(a: number, b: number): boolean {
  return startOfDayMs(a) === startOfDayMs(b);
}

/** Parses `YYYY-MM` into the local month start. */
export function parseMonthKey(input: string): number | null {
  const match = input.trim().match(/^(\d{4})-(\d{2})$/);
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return new Date(Number(match[1]), month - 1, 1).getTime();
}

/** Parses `YYYY-MM-DD` into the local day start. */
export function parseDayKey(input: string): number | null {
  const match = input.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) return null;
  return date.getTime();
}

export function monthRange(monthStartMs: number): DateRange {
  return { startMs: monthStartMs, endMs: addMonthsMs(monthStartMs, 1) };
}

export function dayRange(dayStartMs: number): DateRange {
  return { startMs: dayStartMs, endMs: addDaysMs(dayStartMs, 1) };
}

export function scopeKey(scope: RefreshScope): string {
  switch (scope.kind) {
    case "all":
      return "all";
    case "day":
      return `day:${dayKey(scope.dayStartMs)}`;
    case "month":
      return `month:${monthKey(scope.monthStartMs)}`;
  }
}

export function scopeRange(scope: RefreshScope): DateRange | null {
  switch (scope.kind) {
    case "all":
      return null;
    case "day":
      return dayRange(startOfDayMs(scope.dayStartMs));
    case "month":
      return monthRange(startOfMonthMs(scope.monthStartMs));
  }
}

export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.startMs < b.endMs && b.startMs < a.endMs;
}

const MONTH_NAMES = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** Section title: "Today", "Yesterday" or a medium date such as "Mar 5, 2024". */
export function dayTitle(dayStartMs: number, nowMsValue: number): string {
  const today = startOfDayMs(nowMsValue);
  if (dayStartMs === today) return "Today";
  if (dayStartMs === addDaysMs(today, -1)) return "Yesterday";
  const date = new Date(dayStartMs);
  return `${MONTH_NAMES[date.getMonth()] ?? ""} ${date.getDate()}, ${date.getFullYear()}`;
}

