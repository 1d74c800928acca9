/**
 * Validation errors raised by the attendance core.
 *
 * Every failure is local and synchronous: a record is either fully valid
 * or rejected. Callers (the CLI loop, the API route) catch ValidationError,
 * report the message and keep going.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyNameError extends ValidationError {
  constructor() {
    super("empty name");
  }
}

export class InvalidCharacterError extends ValidationError {
  readonly char: string;

  constructor(char: string) {
    super(`invalid character: ${char}`);
    this.char = char;
  }
}

export class WrongLengthError extends ValidationError {
  readonly actualCount: number;

  constructor(actualCount: number) {
    super("wrong length");
    this.actualCount = actualCount;
  }
}

export class EmptyRosterError extends ValidationError {
  constructor() {
    super("empty roster");
  }
}

export class InvalidCriteriaError extends ValidationError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid defaulter criteria: ${problems.join("; ")}`);
    this.problems = problems;
  }
}
