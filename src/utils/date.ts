/**
 * Calendar helpers for event dates, formatted in Spanish.
 *
 * Weekdays use the JavaScript numbering (0 = Sunday ... 6 = Saturday).
 *
 * @module
 */

import { InvalidInputError } from "../core/errors.js";

export type DateFormat = "full" | "short";

export const SUNDAY = 0;
export const MONDAY = 1;
export const TUESDAY = 2;
export const WEDNESDAY = 3;
export const SATURDAY = 6;

const SPANISH_MONTHS = [
  "enero",
  "febrero",
  "marzo",
  "abril",
  "mayo",
  "junio",
  "julio",
  "agosto",
  "septiembre",
  "octubre",
  "noviembre",
  "diciembre",
] as const;

const SPANISH_DAYS = ["domingo", "lunes", "martes", "miércoles", "jueves", "viernes", "sábado"] as const;

/**
 * Returns `from` itself when it already falls on `weekday`, otherwise the
 * next date that does (same time of day).
 */
export function nextWeekday(weekday: number, from: Date = new Date()): Date {
  if (!Number.isInteger(weekday) || weekday < 0 || weekday > 6) {
    throw new InvalidInputError(`weekday must be an integer between 0 and 6, got ${weekday}`, { weekday });
  }
  const daysUntil = (weekday - from.getDay() + 7) % 7;
  const result = new Date(from.getTime());
  result.setDate(result.getDate() + daysUntil);
  return result;
}

/**
 * "martes 3 de junio" (full) or "3 de junio" (short)
 */
export function formatSpanishDate(date: Date, format: DateFormat = "full"): string {
  const month = SPANISH_MONTHS[date.getMonth()] ?? "";
  const short = `${date.getDate()} de ${month}`;
  if (format === "short") {
    return short;
  }
  return `${SPANISH_DAYS[date.getDay()] ?? ""} ${short}`;
}

// =============================================================================
// Event Dates
// =============================================================================

export function getDynamaxMondayDate(from?: Date): string {
  return formatSpanishDate(nextWeekday(MONDAY, from));
}

export function getSpotlightTuesdayDate(from?: Date): string {
  return formatSpanishDate(nextWeekday(TUESDAY, from));
}

/**
 * @param dayChoice - 1 = Monday ... 7 = Sunday
 */
export function getLegendaryHourDate(dayChoice: number, from?: Date): string {
  if (!Number.isInteger(dayChoice) || dayChoice < 1 || dayChoice > 7) {
    throw new InvalidInputError("dayChoice must be between 1 (Monday) and 7 (Sunday)", { dayChoice });
  }
  return formatSpanishDate(nextWeekday(dayChoice % 7, from));
}

/**
 * Weekend events (Max Battle Day, Raid Day).
 *
 * @param dayChoice - 1 = Saturday, 2 = Sunday
 */
export function getWeekendEventDate(dayChoice: number, from?: Date): string {
  if (dayChoice === 1) {
    return formatSpanishDate(nextWeekday(SATURDAY, from));
  }
  if (dayChoice === 2) {
    return formatSpanishDate(nextWeekday(SUNDAY, from));
  }
  throw new InvalidInputError("dayChoice must be 1 (Saturday) or 2 (Sunday)", { dayChoice });
}

export interface WeekInfo {
  nextMondayDate: string;
  nextMondayShort: string;
  isTodayMonday: boolean;
  daysUntilMonday: number;
  currentDate: string;
}

export function getCurrentWeekInfo(from: Date = new Date()): WeekInfo {
  const nextMonday = nextWeekday(MONDAY, from);
  return {
    nextMondayDate: formatSpanishDate(nextMonday, "full"),
    nextMondayShort: formatSpanishDate(nextMonday, "short"),
    isTodayMonday: from.getDay() === MONDAY,
    daysUntilMonday: (MONDAY - from.getDay() + 7) % 7,
    currentDate: formatSpanishDate(from, "full"),
  };
}
