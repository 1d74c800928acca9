import readline from "readline";
import {
  DefaulterCriteria,
  parsePercentInput,
  parseStreakInput,
  thresholdAsPercent,
  validateCriteria,
} from "../domain/criteria";
import { ValidationError, WrongLengthError } from "../domain/errors";
import { DAYS_IN_WINDOW } from "../domain/attendance";
import { AttendanceRoster } from "../domain/roster";

export interface StudentLine {
  name: string;
  rawAttendance: string;
}

/**
 * Split "Name YYNN YYNN..." into a name and an attendance string.
 * The first whitespace-delimited token is the name; the rest, with all
 * whitespace removed, is the attendance. Returns null if there is no rest.
 */
export function parseStudentLine(line: string): StudentLine | null {
  const match = /^(\S+)\s+(.+)$/s.exec(line.trim());
  if (!match) return null;

  const rawAttendance = match[2].replace(/\s+/g, "");
  if (rawAttendance === "") return null;

  return { name: match[1], rawAttendance };
}

/**
 * Message shown to the user when a record is rejected
 */
export function describeValidationError(err: ValidationError): string {
  if (err instanceof WrongLengthError) {
    return `Error: ${err.message} (got ${err.actualCount} days, expected ${DAYS_IN_WINDOW})`;
  }
  return `Error: ${err.message}`;
}

/**
 * Line reader over a readline interface. Every line is queued as it
 * arrives, so several lines delivered in one chunk (piped input) are all
 * answered in order. Questions asked after input has ended resolve null.
 */
export class LinePrompter {
  private readonly pending: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(private readonly rl: readline.Interface) {
    rl.on("line", (line: string) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = null;
        waiting(line);
      } else {
        this.pending.push(line);
      }
    });
    rl.once("close", () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = null;
      waiting?.(null);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Ask a single question. Lines already received answer immediately;
   * resolves null once input has ended (Ctrl+D, piped EOF).
   */
  ask(prompt: string): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiting = resolve;
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

/**
 * Read student lines into the roster until "done" or end of input.
 * A rejected line is reported and the session carries on.
 */
export async function collectStudents(prompter: LinePrompter, roster: AttendanceRoster): Promise<void> {
  console.log("Enter students and their 30-day attendance records (Y/N or 1/0 format)");
  console.log("Format: StudentName YNNYNY... (30 characters)");
  console.log("Enter 'done' when finished\n");

  while (true) {
    const answer = await prompter.ask("> ");
    if (answer === null) return;

    const input = answer.trim();
    if (input.toLowerCase() === "done") return;
    if (input === "") continue;

    const parsed = parseStudentLine(input);
    if (!parsed) {
      console.log("Invalid format. Use: Name YNNY...");
      continue;
    }

    try {
      const record = roster.add(parsed.name, parsed.rawAttendance);
      console.log(`Added ${record.name}`);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      console.log(describeValidationError(err));
    }
  }
}

/**
 * Ask until the parser accepts the answer. Blank answers and end of
 * input return null so the caller keeps its default.
 */
async function askOptional(
  prompter: LinePrompter,
  prompt: string,
  parse: (text: string) => number | null
): Promise<number | null> {
  while (true) {
    const answer = await prompter.ask(prompt);
    if (answer === null) return null;

    try {
      return parse(answer);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      console.log(describeValidationError(err));
    }
  }
}

/**
 * Collect the defaulter criteria, offering the configured defaults
 */
export async function askCriteria(
  prompter: LinePrompter,
  defaults: DefaulterCriteria
): Promise<DefaulterCriteria> {
  console.log("\nSet defaulter criteria:");
  const absencePercent = await askOptional(
    prompter,
    `Maximum acceptable absence rate (0-100%) [${thresholdAsPercent(defaults)}]: `,
    parsePercentInput
  );
  const minStreak = await askOptional(
    prompter,
    `Minimum acceptable attendance streak (days) [${defaults.minStreak}]: `,
    parseStreakInput
  );

  const criteria: DefaulterCriteria = {
    absenceThreshold: absencePercent === null ? defaults.absenceThreshold : absencePercent / 100,
    minStreak: minStreak ?? defaults.minStreak,
  };
  validateCriteria(criteria);
  return criteria;
}
