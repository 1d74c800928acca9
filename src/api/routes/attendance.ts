/**
 * Attendance API Routes
 *
 * Stateless report computation: each request builds its own roster
 * from the posted students and discards it afterwards.
 */

import { Router } from "express";
import { AttendanceRoster, ReportResult } from "../../domain/roster";
import { DefaulterCriteria, getDefaultCriteria, validateCriteria } from "../../domain/criteria";
import { InvalidCriteriaError, ValidationError } from "../../domain/errors";

export interface RejectedStudent {
  index: number;
  name: string | null;
  error: string;
}

export interface StudentReportRow {
  name: string;
  days: string;
  maxStreak: number;
  currentStreak: number;
  absenceRate: number;
  isDefaulter: boolean;
}

export interface AttendanceReportResponse {
  students: StudentReportRow[];
  summary: {
    totalStudents: number;
    defaulterCount: number;
    defaulterPercentage: number;
    overallAbsenceRate: number;
    avgMaxStreak: number;
  };
  criteria: DefaulterCriteria;
  rejected: RejectedStudent[];
}

export interface ErrorResponse {
  error: string;
  rejected?: RejectedStudent[];
}

export interface HandlerResult {
  status: number;
  body: AttendanceReportResponse | ErrorResponse;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Resolved once so a bad env value warns at startup, not on every request
const configuredDefaults = getDefaultCriteria();

function readNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new InvalidCriteriaError([`${field} must be a number`]);
  }
  return value;
}

/**
 * Read criteria from the body. absenceThreshold is a percentage (0-100);
 * missing fields fall back to the defaults as given.
 */
function readCriteria(body: Record<string, unknown>, defaults: DefaulterCriteria): DefaulterCriteria {
  const absencePercent = readNumber(body.absenceThreshold, "absenceThreshold");
  const minStreak = readNumber(body.minStreak, "minStreak");

  if (absencePercent !== undefined && !(absencePercent >= 0 && absencePercent <= 100)) {
    throw new InvalidCriteriaError(["absenceThreshold must be a percentage between 0 and 100"]);
  }

  const criteria: DefaulterCriteria = {
    absenceThreshold: absencePercent === undefined ? defaults.absenceThreshold : absencePercent / 100,
    minStreak: minStreak ?? defaults.minStreak,
  };
  validateCriteria(criteria);
  return criteria;
}

function toResponse(report: ReportResult, rejected: RejectedStudent[]): AttendanceReportResponse {
  return {
    students: report.entries.map(({ record, isDefaulter }) => ({
      name: record.name,
      days: record.toPresenceString(),
      maxStreak: record.maxStreak,
      currentStreak: record.currentStreak,
      absenceRate: record.absenceRate,
      isDefaulter,
    })),
    summary: {
      totalStudents: report.totalStudents,
      defaulterCount: report.defaulterCount,
      defaulterPercentage: report.defaulterPercentage,
      overallAbsenceRate: report.overallAbsenceRate,
      avgMaxStreak: report.avgMaxStreak,
    },
    criteria: report.criteria,
    rejected,
  };
}

/**
 * Build a roster from the request body and compute the report.
 * Omitted thresholds take `defaults` (the configured ones unless given).
 * Invalid students are collected in `rejected` instead of failing the request.
 */
export function handleReportRequest(
  body: unknown,
  defaults: DefaulterCriteria = configuredDefaults
): HandlerResult {
  if (!isRecord(body) || !Array.isArray(body.students)) {
    return { status: 400, body: { error: "students must be an array" } };
  }

  const roster = new AttendanceRoster();
  const rejected: RejectedStudent[] = [];

  body.students.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.name !== "string" || typeof entry.attendance !== "string") {
      rejected.push({ index, name: null, error: "name and attendance must be strings" });
      return;
    }

    try {
      roster.add(entry.name, entry.attendance.replace(/\s+/g, ""));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      rejected.push({ index, name: entry.name, error: err.message });
    }
  });

  try {
    const criteria = readCriteria(body, defaults);
    const report = roster.report(criteria.absenceThreshold, criteria.minStreak);
    return { status: 200, body: toResponse(report, rejected) };
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    return { status: 400, body: { error: err.message, rejected } };
  }
}

const router = Router();

/**
 * POST /api/attendance/report
 * Classify posted students and return cohort statistics
 */
router.post("/report", (req, res) => {
  try {
    const result = handleReportRequest(req.body);
    res.status(result.status).json(result.body);
  } catch (error) {
    console.error("Error computing attendance report:", error);
    res.status(500).json({ error: "Failed to compute attendance report" });
  }
});

export default router;
