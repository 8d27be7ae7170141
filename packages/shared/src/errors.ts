export type WorldClockErrorCode =
  | "INVALID_ZONE"
  | "INVALID_DATE_FORMAT"
  | "INVALID_TIME_FORMAT"
  | "INVALID_PATTERN"
  | "NAIVE_INSTANT"
  | "INVALID_DURATION"
  | "INVALID_CHOICE"
  | "INPUT_CLOSED";

/**
 * Base class for every recoverable input failure.
 * `input` is the offending value as the user typed it; `expected` describes the accepted form.
 */
export class WorldClockError extends Error {
  readonly code: WorldClockErrorCode;
  readonly input: string;
  readonly expected: string;

  constructor(code: WorldClockErrorCode, message: string, input: string, expected: string) {
    super(message);
    this.name = "WorldClockError";
    this.code = code;
    this.input = input;
    this.expected = expected;
  }
}

export class InvalidZoneError extends WorldClockError {
  constructor(zone: string) {
    super(
      "INVALID_ZONE",
      `Unknown time zone "${zone}"`,
      zone,
      "an IANA time zone identifier such as Europe/London",
    );
    this.name = "InvalidZoneError";
  }
}

export class InvalidDateFormatError extends WorldClockError {
  constructor(date: string) {
    super("INVALID_DATE_FORMAT", `Invalid date "${date}"`, date, "a calendar date as YYYY-MM-DD");
    this.name = "InvalidDateFormatError";
  }
}

export class InvalidTimeFormatError extends WorldClockError {
  constructor(time: string) {
    super("INVALID_TIME_FORMAT", `Invalid time "${time}"`, time, "a 24-hour time as HH:MM");
    this.name = "InvalidTimeFormatError";
  }
}

export class InvalidPatternError extends WorldClockError {
  constructor(pattern: string, reason: string) {
    super(
      "INVALID_PATTERN",
      `Invalid format pattern "${pattern}": ${reason}`,
      pattern,
      "a preset name or tokens from yyyy MMMM dd HH mm ss zzz",
    );
    this.name = "InvalidPatternError";
  }
}

export class NaiveInstantError extends WorldClockError {
  constructor(epochMs: number) {
    super(
      "NAIVE_INSTANT",
      `Timestamp ${new Date(epochMs).toISOString().slice(0, 19)} carries no time zone`,
      String(epochMs),
      "a timestamp with a time zone attached",
    );
    this.name = "NaiveInstantError";
  }
}

export class InvalidDurationError extends WorldClockError {
  constructor(duration: string) {
    super(
      "INVALID_DURATION",
      `Invalid duration "${duration}"`,
      duration,
      "a number of hours greater than 0 and at most 48, e.g. 8.5",
    );
    this.name = "InvalidDurationError";
  }
}

export class InvalidChoiceError extends WorldClockError {
  constructor(choice: string, expected: string) {
    super("INVALID_CHOICE", `Invalid choice "${choice}"`, choice, expected);
    this.name = "InvalidChoiceError";
  }
}

export class InputClosedError extends WorldClockError {
  constructor(question: string) {
    super("INPUT_CLOSED", `Input ended while waiting for "${question}"`, "", "an answer before end of input");
    this.name = "InputClosedError";
  }
}
