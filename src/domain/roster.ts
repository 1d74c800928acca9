import { AttendanceRecord } from "./attendance";
import { DefaulterCriteria, validateCriteria } from "./criteria";
import { EmptyRosterError } from "./errors";

export interface ClassifiedRecord {
  record: AttendanceRecord;
  isDefaulter: boolean;
}

/**
 * Result of a report pass. Rendering is left to the caller.
 */
export interface ReportResult {
  criteria: DefaulterCriteria;
  entries: ClassifiedRecord[]; // sorted by name
  totalStudents: number;
  defaulterCount: number;
  defaulterPercentage: number; // fraction, 0-1
  overallAbsenceRate: number; // mean absence rate, 0-1
  avgMaxStreak: number;
}

/**
 * AttendanceRoster holds one class's records in insertion order.
 * Duplicate names are allowed. Nothing is cached; every report
 * is computed from the current records.
 */
export class AttendanceRoster {
  private readonly records: AttendanceRecord[] = [];

  /**
   * Validate and append a record. Validation errors propagate unchanged.
   */
  add(name: string, rawData: string): AttendanceRecord {
    const record = AttendanceRecord.create(name, rawData);
    this.records.push(record);
    return record;
  }

  get size(): number {
    return this.records.length;
  }

  getRecords(): readonly AttendanceRecord[] {
    return [...this.records];
  }

  report(absenceThreshold: number, minStreak: number): ReportResult {
    if (this.records.length === 0) {
      throw new EmptyRosterError();
    }

    const criteria: DefaulterCriteria = { absenceThreshold, minStreak };
    validateCriteria(criteria);

    // Array.prototype.sort is stable, so equal names keep insertion order
    const sorted = [...this.records].sort((a, b) => compareOrdinal(a.name, b.name));

    const entries = sorted.map(record => ({
      record,
      isDefaulter: record.isDefaulter(absenceThreshold, minStreak),
    }));

    const totalStudents = entries.length;
    const defaulterCount = entries.filter(e => e.isDefaulter).length;
    const totalAbsence = sorted.reduce((sum, r) => sum + r.absenceRate, 0);
    const totalMaxStreak = sorted.reduce((sum, r) => sum + r.maxStreak, 0);

    return {
      criteria,
      entries,
      totalStudents,
      defaulterCount,
      defaulterPercentage: defaulterCount / totalStudents,
      overallAbsenceRate: totalAbsence / totalStudents,
      avgMaxStreak: totalMaxStreak / totalStudents,
    };
  }
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
