import { WorldClockError } from "@shared/errors";

export interface ErrorReport {
  code: string;
  message: string;
  expected?: string;
  /** False for failures that are not bad user input. */
  expectedFailure: boolean;
}

export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof WorldClockError) {
    return {
      code: error.code,
      message: error.message,
      expected: error.expected,
      expectedFailure: true,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    code: "INTERNAL_ERROR",
    message: message || "Unexpected error",
    expectedFailure: false,
  };
}

/** e.g. `Error (INVALID_ZONE): Unknown time zone "Mars/Phobos". Expected an IANA ...` */
export function formatErrorReport(report: ErrorReport): string {
  const expected = report.expected ? ` Expected ${report.expected}.` : "";
  const message = report.message.replace(/\.+$/, "");
  return `Error (${report.code}): ${message}.${expected}`;
}
