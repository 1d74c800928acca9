import { ReportResult } from "../domain/roster";
import { formatPercent } from "../domain/attendance";

const RULE_WIDTH = 80;
const RED = "\x1b[31m";
const RESET = "\x1b[0m";

export interface RenderOptions {
  color: boolean;
}

/**
 * Color only when writing to a terminal and NO_COLOR is not set
 */
export function shouldUseColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return Boolean(stream.isTTY) && !env.NO_COLOR;
}

/**
 * Render the analysis report as lines of text
 */
export function renderReport(result: ReportResult, options: RenderOptions): string[] {
  const lines: string[] = [];

  lines.push("");
  lines.push("Attendance Analysis Results");
  lines.push("=".repeat(RULE_WIDTH));
  lines.push("Legend: Y = Present, N = Absent");
  lines.push("-".repeat(RULE_WIDTH));

  for (const { record, isDefaulter } of result.entries) {
    if (!isDefaulter) {
      lines.push(record.format());
      continue;
    }

    const line = `${record.format()} [DEFAULTER]`;
    lines.push(options.color ? `${RED}${line}${RESET}` : line);
  }

  lines.push("-".repeat(RULE_WIDTH));
  lines.push(`Total Students: ${result.totalStudents}`);
  lines.push(`Defaulters: ${result.defaulterCount} (${formatPercent(result.defaulterPercentage)})`);
  lines.push("");
  lines.push(`Overall Absence Rate: ${formatPercent(result.overallAbsenceRate)}`);
  lines.push(`Average Maximum Streak: ${result.avgMaxStreak.toFixed(1)} days`);

  return lines;
}

/**
 * Print the report to stdout
 */
export function printReport(result: ReportResult, options: RenderOptions = { color: shouldUseColor() }): void {
  for (const line of renderReport(result, options)) {
    console.log(line);
  }
}
