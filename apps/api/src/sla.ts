import type { ProgramRules } from "@flockreview/shared";

export type SlaCalendar = ProgramRules["sla"]["calendar"];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * SLA deadline for a level: `start + days`, counted either as calendar days or
 * as working days that skip Saturdays, Sundays and the given holidays
 * (ISO dates, compared in UTC). The time of day of `start` is kept.
 */
export function computeSlaDeadline(
  start: Date,
  days: number,
  calendar: SlaCalendar = "CALENDAR_DAYS",
  holidays: readonly string[] = []
): Date {
  if (calendar === "CALENDAR_DAYS") {
    return new Date(start.getTime() + days * DAY_MS);
  }

  const holidaySet = new Set(holidays);
  const dueDate = new Date(start.getTime());
  let daysAdded = 0;

  while (daysAdded < days) {
    dueDate.setUTCDate(dueDate.getUTCDate() + 1);
    const dayOfWeek = dueDate.getUTCDay();

    // Skip Saturday (6), Sunday (0), and program holidays
    if (dayOfWeek === 0 || dayOfWeek === 6) continue;
    if (holidaySet.has(dueDate.toISOString().slice(0, 10))) continue;

    daysAdded++;
  }

  return dueDate;
}

export function addDays(start: Date, days: number): Date {
  return new Date(start.getTime() + days * DAY_MS);
}

/** Whole days elapsed between two instants, never negative. */
export function daysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / DAY_MS));
}
