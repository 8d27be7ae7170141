import { describe, it, expect } from "vitest";
import pino from "pino";
import { loadCities } from "@shared/time/cities";
import { loadPresets } from "@shared/time/presets";
import { TimeSource, fixedNow } from "@shared/time/source";

import type { ShellIO } from "../shell/io";
import type { MenuOption } from "../shell/menu";
import { InteractiveShell } from "../shell/shell";
import type { ShellState } from "../shell/state";

// Wednesday 19 March 2025, 14:30 in New York, 18:30 in London
const NOW = Date.UTC(2025, 2, 19, 18, 30);

const presets = loadPresets();
const cities = loadCities();

function scriptedIO(answers: string[]) {
  const queue = [...answers];
  const output: string[] = [];
  const prompts: string[] = [];

  const io: ShellIO = {
    async question(prompt) {
      prompts.push(prompt);
      return queue.shift() ?? null;
    },
    write(line) {
      output.push(line);
    },
  };

  return { io, output, prompts };
}

async function runShell(answers: string[], options?: readonly MenuOption[]) {
  const { io, output, prompts } = scriptedIO(answers);
  const transitions: string[] = [];

  const shell = new InteractiveShell({
    io,
    logger: pino({ level: "silent" }),
    context: { timeSource: new TimeSource(fixedNow(NOW)), presets, cities },
    options,
    onTransition: (from: ShellState, to: ShellState) => transitions.push(`${from}->${to}`),
  });
  await shell.run();

  return { output, prompts, transitions, shell };
}

/** The lines a single option wrote after the blank separator that follows its prompts. */
function resultAfter(output: string[], first: string, count: number): string[] {
  const index = output.indexOf(first);
  expect(index).toBeGreaterThan(0);
  expect(output[index - 1]).toBe("");
  return output.slice(index, index + count);
}

describe("InteractiveShell", () => {
  it("prints the banner and menu, then exits on 0", async () => {
    const { output, prompts, shell } = await runShell(["0"]);

    expect(output).toEqual([
      "===== WORLD CLOCK - TIME ZONE TOOL =====",
      "",
      "Select an option:",
      "1. Show current UTC time",
      "2. Show current time in a time zone",
      "3. Convert a timestamp to another time zone",
      "4. Format a timestamp",
      "5. Time difference between two time zones",
      "6. World clock",
      "7. Plan a flight",
      "0. Exit",
      "Goodbye!",
    ]);
    expect(prompts).toEqual(["Enter your choice (0-7): "]);
    expect(shell.currentState).toBe("Exited");
  });

  it("accepts quit words and end of input as exit", async () => {
    for (const answers of [["q"], ["QUIT"], [" exit "], []]) {
      const { output, shell } = await runShell(answers);
      expect(output[output.length - 1]).toBe("Goodbye!");
      expect(shell.currentState).toBe("Exited");
    }
  });

  it("shows the current UTC time", async () => {
    const { output, transitions } = await runShell(["1", "0"]);

    expect(resultAfter(output, "Current UTC time: 2025-03-19 18:30:00 UTC", 1)).toEqual([
      "Current UTC time: 2025-03-19 18:30:00 UTC",
    ]);
    expect(transitions).toEqual([
      "MenuDisplayed->AwaitingInput",
      "AwaitingInput->Dispatching",
      "Dispatching->ResultDisplayed",
      "ResultDisplayed->MenuDisplayed",
      "MenuDisplayed->Exited",
    ]);
  });

  it("shows the current time and offset in a zone", async () => {
    const { output, prompts } = await runShell(["2", "America/New_York", "0"]);

    expect(prompts[1]).toBe("Time zone (IANA name, city name or city number): ");
    expect(
      resultAfter(output, "Current time in America/New_York: 2025-03-19 14:30:00 EDT", 2),
    ).toEqual([
      "Current time in America/New_York: 2025-03-19 14:30:00 EDT",
      "UTC offset: -04:00 (daylight saving time)",
    ]);
  });

  it("accepts a city name or number for a zone", async () => {
    const { output } = await runShell(["2", "tokyo", "2", "2", "0"]);

    expect(output).toContain("Current time in Tokyo: 2025-03-20 03:30:00 GMT+9");
    expect(output).toContain("UTC offset: +09:00");
    expect(output).toContain("Current time in London: 2025-03-19 18:30:00 GMT");
    expect(output).toContain("UTC offset: +00:00");
  });

  it("reports an unknown zone and returns to the menu", async () => {
    const { output, transitions } = await runShell(["2", "Mars/Phobos", "0"]);

    expect(output).toContain(
      'Error (INVALID_ZONE): Unknown time zone "Mars/Phobos". Expected an IANA time zone identifier such as Europe/London.',
    );
    expect(transitions).toEqual([
      "MenuDisplayed->AwaitingInput",
      "AwaitingInput->ErrorDisplayed",
      "ErrorDisplayed->MenuDisplayed",
      "MenuDisplayed->Exited",
    ]);
    expect(output[output.length - 1]).toBe("Goodbye!");
  });

  it("converts a wall-clock time between zones", async () => {
    const { output } = await runShell([
      "3",
      "2025-03-19",
      "14:30",
      "America/New_York",
      "UTC",
      "0",
    ]);

    expect(
      resultAfter(output, "Source time: 2025-03-19 14:30:00 EDT (America/New_York)", 2),
    ).toEqual([
      "Source time: 2025-03-19 14:30:00 EDT (America/New_York)",
      "Converted time: 2025-03-19 18:30:00 UTC (UTC)",
    ]);
  });

  it("stops asking once a date is invalid", async () => {
    const { output, prompts } = await runShell(["3", "2025-13-40", "0"]);

    expect(output).toContain(
      'Error (INVALID_DATE_FORMAT): Invalid date "2025-13-40". Expected a calendar date as YYYY-MM-DD.',
    );
    expect(prompts).toEqual([
      "Enter your choice (0-7): ",
      "Date (YYYY-MM-DD): ",
      "Enter your choice (0-7): ",
    ]);
  });

  it("formats with presets by name, case-insensitively", async () => {
    const { output } = await runShell([
      "4",
      "2025-03-19",
      "14:30",
      "America/New_York",
      "US",
      "4",
      "2025-01-15",
      "09:00",
      "London",
      "uk",
      "0",
    ]);

    expect(output).toContain("Formatted time: March 19, 2025 14:30 EDT");
    expect(output).toContain("Formatted time: 15 January 2025 09:00 GMT");
  });

  it("formats with a custom pattern", async () => {
    const { output } = await runShell([
      "4",
      "2025-03-19",
      "14:30",
      "America/New_York",
      "%Y/%m/%d %H:%M",
      "0",
    ]);

    expect(output).toContain("Formatted time: 2025/03/19 14:30");
  });

  it("reports an unsupported pattern while dispatching", async () => {
    const { output, transitions } = await runShell([
      "4",
      "2025-03-19",
      "14:30",
      "UTC",
      "yyyy jj",
      "0",
    ]);

    expect(output).toContain(
      'Error (INVALID_PATTERN): Invalid format pattern "yyyy jj": unsupported token "jj". Expected a preset name or tokens from yyyy MMMM dd HH mm ss zzz.',
    );
    expect(transitions).toContain("Dispatching->ErrorDisplayed");
  });

  it("shows the difference between two zones now", async () => {
    const { output } = await runShell(["5", "Asia/Tokyo", "America/New_York", "", "0"]);

    expect(resultAfter(output, "Current time in Asia/Tokyo: 2025-03-20 03:30:00 GMT+9", 4)).toEqual([
      "Current time in Asia/Tokyo: 2025-03-20 03:30:00 GMT+9",
      "Current time in America/New_York: 2025-03-19 14:30:00 EDT",
      "Time difference: 13 hours 0 minutes",
      "Asia/Tokyo is ahead of America/New_York",
    ]);
  });

  it("compares home and destination cities in their own presets", async () => {
    const { output } = await runShell(["5", "London", "New York", "", "0"]);

    expect(resultAfter(output, "Current time in London: 19 March 2025 18:30 GMT", 4)).toEqual([
      "Current time in London: 19 March 2025 18:30 GMT",
      "Current time in New York: March 19, 2025 02:30 PM EDT",
      "Time difference: 4 hours 0 minutes",
      "London is ahead of New York",
    ]);
  });

  it("shows the difference on a given date", async () => {
    const { output } = await runShell(["5", "America/New_York", "Asia/Tokyo", "2025-01-15", "0"]);

    expect(resultAfter(output, "Time difference: -14 hours 0 minutes", 2)).toEqual([
      "Time difference: -14 hours 0 minutes",
      "America/New_York is behind Asia/Tokyo",
    ]);
  });

  it("shows matching zones as the same time", async () => {
    const { output } = await runShell(["5", "UTC", "Etc/UTC", "", "0"]);

    expect(output).toContain("Time difference: 0 hours 0 minutes");
    expect(output).toContain("UTC and Etc/UTC show the same time");
  });

  it("prints the world clock", async () => {
    const { output } = await runShell(["6", "0"]);

    const result = resultAfter(output, "World clock:", cities.length + 1);
    expect(result).toHaveLength(9);
    expect(result[1]).toBe("New York: March 19, 2025 02:30 PM EDT");
    expect(result[2]).toBe("London: 19 March 2025 18:30 GMT");
  });

  it("plans a flight across zones", async () => {
    const { output } = await runShell([
      "7",
      "New York",
      "London",
      "2025-03-20",
      "18:00",
      "7",
      "0",
    ]);

    expect(resultAfter(output, "Flight: New York to London", 4)).toEqual([
      "Flight: New York to London",
      "Departure: March 20, 2025 06:00 PM EDT",
      "Arrival: 21 March 2025 05:00 GMT",
      "Time difference: 4 hours 0 minutes",
    ]);
  });

  it("rejects a zero flight duration", async () => {
    const { output } = await runShell([
      "7",
      "New York",
      "London",
      "2025-03-20",
      "18:00",
      "0",
      "0",
    ]);

    expect(output).toContain(
      'Error (INVALID_DURATION): Invalid duration "0". Expected a number of hours greater than 0 and at most 48, e.g. 8.5.',
    );
  });

  it("reports an unknown choice", async () => {
    const { output, transitions } = await runShell(["9", "0"]);

    expect(output).toContain('Error (INVALID_CHOICE): Invalid choice "9". Expected one of 0-7.');
    expect(transitions).toEqual([
      "MenuDisplayed->ErrorDisplayed",
      "ErrorDisplayed->MenuDisplayed",
      "MenuDisplayed->Exited",
    ]);
  });

  it("reports input ending mid-option, then exits", async () => {
    const { output, shell } = await runShell(["3", "2025-03-19"]);

    expect(output).toContain(
      'Error (INPUT_CLOSED): Input ended while waiting for "Time (HH:MM, 24-hour)". Expected an answer before end of input.',
    );
    expect(output[output.length - 1]).toBe("Goodbye!");
    expect(shell.currentState).toBe("Exited");
  });

  it("reports unexpected failures as internal errors", async () => {
    const explode: MenuOption = {
      key: "1",
      label: "Explode",
      async prepare() {
        return () => {
          throw new Error("boom");
        };
      },
    };

    const { output, prompts } = await runShell(["1", "0"], [explode]);

    expect(output).toContain("1. Explode");
    expect(output).toContain("Error (INTERNAL_ERROR): boom.");
    expect(prompts[0]).toBe("Enter your choice (0-1): ");
  });
});
