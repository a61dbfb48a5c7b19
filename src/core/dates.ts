import { InvalidArgumentError } from "./errors";

export interface YearMonth {
  year: number;
  month: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function fromUtc(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/**
 * Normalizes `YYYY-MM-DD` or `YYYYMMDD` into `YYYY-MM-DD`, rejecting
 * impossible dates such as `2024-02-30`.
 */
export function parseDay(raw: string): string {
  const trimmed = raw.trim();
  const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(trimmed);
  if (!match) {
    throw new InvalidArgumentError(`Invalid date: ${raw} (expected YYYY-MM-DD or YYYYMMDD)`);
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InvalidArgumentError(`Invalid date: ${raw}`);
  }
  return fromUtc(date);
}

/** Accepts `YYYY-MM`, `YYYYMM`, or a full day whose day part is ignored. */
export function parseYearMonth(raw: string): YearMonth {
  const trimmed = raw.trim();
  const match = /^(\d{4})-?(\d{2})(?:-?\d{2})?$/.exec(trimmed);
  if (!match) {
    throw new InvalidArgumentError(`Invalid month: ${raw} (expected YYYY-MM or YYYYMM)`);
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  if (month < 1 || month > 12) {
    throw new InvalidArgumentError(`Invalid month: ${raw}`);
  }
  return { year, month };
}

export function formatYearMonth(value: YearMonth): string {
  return `${value.year}-${pad2(value.month)}`;
}

export function daysInMonth(value: YearMonth): number {
  return new Date(Date.UTC(value.year, value.month, 0)).getUTCDate();
}

export function monthDays(value: YearMonth, firstDay = 1): string[] {
  const last = daysInMonth(value);
  const days: string[] = [];
  for (let day = Math.max(1, firstDay); day <= last; day += 1) {
    days.push(`${value.year}-${pad2(value.month)}-${pad2(day)}`);
  }
  return days;
}

export function dayRange(start: string, end: string): string[] {
  const startMs = Date.parse(`${parseDay(start)}T00:00:00Z`);
  const endMs = Date.parse(`${parseDay(end)}T00:00:00Z`);
  if (endMs < startMs) {
    throw new InvalidArgumentError(`End date ${end} is before start date ${start}`);
  }

  const days: string[] = [];
  for (let ms = startMs; ms <= endMs; ms += DAY_MS) {
    days.push(fromUtc(new Date(ms)));
  }
  return days;
}

export function dayParts(day: string): { year: string; month: string; day: string } {
  const [year, month, dayOfMonth] = parseDay(day).split("-");
  return { year, month, day: dayOfMonth };
}

/** Inclusive temporal window covering one UTC day, as catalog query bounds. */
export function dayWindow(day: string): { start: string; end: string } {
  const normalized = parseDay(day);
  return {
    start: `${normalized}T00:00:00Z`,
    end: `${normalized}T23:59:59Z`,
  };
}
