#!/usr/bin/env node
import "dotenv/config";
import readline from "readline";
import { AttendanceRoster } from "../domain/roster";
import { getDefaultCriteria } from "../domain/criteria";
import { LinePrompter, askCriteria, collectStudents } from "./helpers";
import { printReport } from "./reportRenderer";

async function main(): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
  const prompter = new LinePrompter(rl);
  const roster = new AttendanceRoster();

  try {
    await collectStudents(prompter, roster);

    if (roster.size === 0) {
      console.log("\nNo students entered.");
      return;
    }

    const criteria = await askCriteria(prompter, getDefaultCriteria());
    printReport(roster.report(criteria.absenceThreshold, criteria.minStreak));
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  console.error("Attendance analysis failed:", err);
  process.exitCode = 1;
});
