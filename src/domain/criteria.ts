import { InvalidCriteriaError } from "./errors";

/**
 * Defaulter criteria: the thresholds a report is computed with.
 *
 * Teachers enter the absence ceiling as a percentage (0-100); the core
 * works with a fraction (0-1).
 */
export interface DefaulterCriteria {
  absenceThreshold: number; // fraction, 0-1
  minStreak: number; // days
}

export const DEFAULT_ABSENCE_PERCENT = 10;
export const DEFAULT_MIN_STREAK = 5;

/**
 * Throws InvalidCriteriaError listing every out-of-range value
 */
export function validateCriteria(criteria: DefaulterCriteria): void {
  const errors: string[] = [];

  if (
    !Number.isFinite(criteria.absenceThreshold) ||
    criteria.absenceThreshold < 0 ||
    criteria.absenceThreshold > 1
  ) {
    errors.push("absenceThreshold must be between 0 and 1");
  }

  if (!Number.isInteger(criteria.minStreak) || criteria.minStreak < 0) {
    errors.push("minStreak must be a non-negative whole number");
  }

  if (errors.length > 0) {
    throw new InvalidCriteriaError(errors);
  }
}

/**
 * Build criteria from a percentage and a day count
 */
export function criteriaFromInput(absencePercent: number, minStreak: number): DefaulterCriteria {
  const criteria = { absenceThreshold: absencePercent / 100, minStreak };
  validateCriteria(criteria);
  return criteria;
}

/**
 * Absence threshold as a percentage, rounded to two decimals
 */
export function thresholdAsPercent(criteria: DefaulterCriteria): number {
  return Math.round(criteria.absenceThreshold * 10000) / 100;
}

/**
 * Parse a percentage typed by the user.
 * Blank input returns null so the caller can use its default.
 */
export function parsePercentInput(text: string): number | null {
  const trimmed = text.trim().replace(/%$/, "").trim();
  if (trimmed === "") return null;

  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new InvalidCriteriaError(["absence threshold must be a number between 0 and 100"]);
  }
  return value;
}

/**
 * Parse a streak length typed by the user.
 * Blank input returns null so the caller can use its default.
 */
export function parseStreakInput(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;

  const value = Number(trimmed);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidCriteriaError(["minimum streak must be a non-negative whole number"]);
  }
  return value;
}

/**
 * Default criteria from the environment, falling back to built-in values
 */
export function getDefaultCriteria(env: NodeJS.ProcessEnv = process.env): DefaulterCriteria {
  let absencePercent = DEFAULT_ABSENCE_PERCENT;
  let minStreak = DEFAULT_MIN_STREAK;

  try {
    absencePercent = parsePercentInput(env.ATTENDANCE_ABSENCE_THRESHOLD ?? "") ?? DEFAULT_ABSENCE_PERCENT;
  } catch (err) {
    console.warn(`Ignoring ATTENDANCE_ABSENCE_THRESHOLD: ${errorMessage(err)}`);
  }

  try {
    minStreak = parseStreakInput(env.ATTENDANCE_MIN_STREAK ?? "") ?? DEFAULT_MIN_STREAK;
  } catch (err) {
    console.warn(`Ignoring ATTENDANCE_MIN_STREAK: ${errorMessage(err)}`);
  }

  return criteriaFromInput(absencePercent, minStreak);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
