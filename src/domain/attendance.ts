/**
 * Attendance Domain Model
 *
 * One student's attendance over a closed 30-day window.
 * Statistics are derived once at construction and never change:
 * - absenceRate: fraction of absent days
 * - maxStreak: longest run of present days
 * - currentStreak: run of present days ending on the last day
 */

import { EmptyNameError, InvalidCharacterError, WrongLengthError } from "./errors";

export const DAYS_IN_WINDOW = 30;

const NAME_COLUMN_WIDTH = 15;

export type Presence = "present" | "absent";

const PRESENCE_BY_CHAR = new Map<string, Presence>([
  ["1", "present"],
  ["Y", "present"],
  ["y", "present"],
  ["0", "absent"],
  ["N", "absent"],
  ["n", "absent"],
]);

/**
 * Parse raw attendance characters. The first unknown character fails,
 * even if the length is also wrong.
 */
export function parseAttendance(rawData: string): Presence[] {
  const days: Presence[] = [];

  for (const char of rawData) {
    const presence = PRESENCE_BY_CHAR.get(char);
    if (presence === undefined) {
      throw new InvalidCharacterError(char);
    }
    days.push(presence);
  }

  if (days.length !== DAYS_IN_WINDOW) {
    throw new WrongLengthError(days.length);
  }

  return days;
}

export class AttendanceRecord {
  readonly name: string;
  readonly days: readonly Presence[];
  readonly absenceRate: number;
  readonly maxStreak: number;
  readonly currentStreak: number;

  private constructor(name: string, days: Presence[]) {
    this.name = name;
    this.days = Object.freeze(days);

    let absentDays = 0;
    let run = 0;
    let maxStreak = 0;

    for (const day of days) {
      if (day === "present") {
        run++;
        if (run > maxStreak) maxStreak = run;
      } else {
        absentDays++;
        run = 0;
      }
    }

    this.absenceRate = absentDays / days.length;
    this.maxStreak = maxStreak;
    this.currentStreak = run;
  }

  /**
   * Validate and build a record.
   * Whitespace inside rawData is not stripped here; callers do that.
   */
  static create(name: string, rawData: string): AttendanceRecord {
    if (name.trim().length === 0) {
      throw new EmptyNameError();
    }
    return new AttendanceRecord(name, parseAttendance(rawData));
  }

  /**
   * Absence rate strictly above the threshold, or a longest streak
   * strictly below the minimum, makes a defaulter.
   */
  isDefaulter(absenceThreshold: number, minStreak: number): boolean {
    return this.absenceRate > absenceThreshold || this.maxStreak < minStreak;
  }

  /**
   * Canonical Y/N form of the days
   */
  toPresenceString(): string {
    return this.days.map(day => (day === "present" ? "Y" : "N")).join("");
  }

  /**
   * Single report line, without highlighting
   */
  format(): string {
    return (
      `${this.name.padEnd(NAME_COLUMN_WIDTH)} ${this.toPresenceString()} | ` +
      `Max: ${String(this.maxStreak).padStart(2)} days | ` +
      `Current: ${String(this.currentStreak).padStart(2)} days | ` +
      `Absent: ${formatPercent(this.absenceRate)}`
    );
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Format a fraction as a whole percentage, e.g. 0.1 -> "10%"
 */
export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}
