import { addDays, differenceInCalendarDays, format, isValid, parse, subDays } from 'date-fns';

/**
 * A calendar date (`yyyy-MM-dd`, local calendar) shifted by the profile's day transition hour.
 * Lexicographic order is chronological order.
 */
export type ProgramDay = string;

const PROGRAM_DAY_FORMAT = 'yyyy-MM-dd';
const PROGRAM_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function toDate(day: ProgramDay): Date {
  return parse(day, PROGRAM_DAY_FORMAT, new Date(2000, 0, 1));
}

export function isValidTransitionHour(hour: number): boolean {
  return Number.isInteger(hour) && hour >= 0 && hour <= 23;
}

/**
 * Program day a timestamp belongs to. Before `boundaryHour` (local time) the
 * timestamp still counts as the previous calendar day, e.g. 02:00 with hour 3.
 */
export function programDay(at: Date, boundaryHour: number): ProgramDay {
  if (!isValidTransitionHour(boundaryHour)) {
    throw new RangeError(`Day transition hour must be an integer in 0..23, got ${boundaryHour}`);
  }
  const effective = at.getHours() < boundaryHour ? subDays(at, 1) : at;
  return format(effective, PROGRAM_DAY_FORMAT);
}

export function isProgramDay(value: unknown): value is ProgramDay {
  if (typeof value !== 'string' || !PROGRAM_DAY_PATTERN.test(value)) return false;
  const date = toDate(value);
  return isValid(date) && format(date, PROGRAM_DAY_FORMAT) === value;
}

export function isSameDay(a: ProgramDay, b: ProgramDay): boolean {
  return a === b;
}

/** Signed whole days from `a` to `b` (`b - a`). */
export function daysBetween(a: ProgramDay, b: ProgramDay): number {
  return differenceInCalendarDays(toDate(b), toDate(a));
}

export function compareProgramDays(a: ProgramDay, b: ProgramDay): -1 | 0 | 1 {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** The later of two days; `null` is older than any day. */
export function laterProgramDay(a: ProgramDay | null, b: ProgramDay | null): ProgramDay | null {
  if (a == null) return b;
  if (b == null) return a;
  return compareProgramDays(a, b) >= 0 ? a : b;
}

export function addProgramDays(day: ProgramDay, amount: number): ProgramDay {
  return format(addDays(toDate(day), amount), PROGRAM_DAY_FORMAT);
}
