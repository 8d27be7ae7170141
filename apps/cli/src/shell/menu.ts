import { findCity } from "@shared/time/cities";
import { convert } from "@shared/time/convert";
import { calculateDifference, describeDifference } from "@shared/time/difference";
import { findPreset, format, formatWithPreset, resolveFormatChoice } from "@shared/time/format";
import { fromWallClock, shiftMinutes } from "@shared/time/instant";
import { parseDateInput, parseDurationHours, parseTimeInput } from "@shared/time/parse";
import type { TimeSource } from "@shared/time/source";
import { resolveZone } from "@shared/time/zone";
import type { City, FormatPreset, Instant, PresetTable, ZoneIdentifier } from "@worldclock/shared";
import { formatUtcOffset, getZoneOffsetMinutes, isDaylightSaving } from "@shared/utils/time";

export const DISPLAY_PATTERN = "yyyy-MM-dd HH:mm:ss zzz";

export interface ShellContext {
  timeSource: TimeSource;
  presets: PresetTable;
  cities: readonly City[];
}

/** Prompts for one answer; the answer comes back trimmed. */
export type Ask = (question: string) => Promise<string>;

/** Runs while the shell is Dispatching and returns the lines to display. */
export type MenuAction = () => string[];

/**
 * Every option shares one contract: `prepare` collects and validates its
 * inputs, and the returned action does the work.
 */
export interface MenuOption {
  key: string;
  label: string;
  prepare(ask: Ask, context: ShellContext): Promise<MenuAction>;
}

interface ZoneChoice {
  zone: ZoneIdentifier;
  label: string;
  preset?: FormatPreset;
}

function chooseZone(input: string, context: ShellContext): ZoneChoice {
  const city = findCity(input, context.cities);
  if (city) {
    return { zone: city.zone, label: city.name, preset: findPreset(city.preset, context.presets) };
  }
  const zone = resolveZone(input);
  return { zone, label: zone };
}

function display(instant: Instant, preset?: FormatPreset): string {
  return preset ? formatWithPreset(instant, preset) : format(instant, DISPLAY_PATTERN);
}

const ZONE_PROMPT = "Time zone (IANA name, city name or city number)";

const currentUtc: MenuOption = {
  key: "1",
  label: "Show current UTC time",
  async prepare(_ask, { timeSource }) {
    return () => [`Current UTC time: ${format(timeSource.getCurrentUtc(), DISPLAY_PATTERN)}`];
  },
};

const currentInZone: MenuOption = {
  key: "2",
  label: "Show current time in a time zone",
  async prepare(ask, context) {
    const target = chooseZone(await ask(ZONE_PROMPT), context);

    return () => {
      const now = context.timeSource.getCurrentInZone(target.zone);
      const offset = formatUtcOffset(getZoneOffsetMinutes(target.zone, now.epochMs));
      const dst = isDaylightSaving(target.zone, now.epochMs) ? " (daylight saving time)" : "";
      return [
        `Current time in ${target.label}: ${format(now, DISPLAY_PATTERN)}`,
        `UTC offset: ${offset}${dst}`,
      ];
    };
  },
};

const convertTimestamp: MenuOption = {
  key: "3",
  label: "Convert a timestamp to another time zone",
  async prepare(ask, context) {
    const date = parseDateInput(await ask("Date (YYYY-MM-DD)"));
    const time = parseTimeInput(await ask("Time (HH:MM, 24-hour)"));
    const source = chooseZone(await ask("Source time zone"), context);
    const target = chooseZone(await ask("Target time zone"), context);

    return () => {
      const instant = fromWallClock(date, time, source.zone);
      const converted = convert(instant, target.zone);
      return [
        `Source time: ${format(instant, DISPLAY_PATTERN)} (${source.label})`,
        `Converted time: ${format(converted, DISPLAY_PATTERN)} (${target.label})`,
      ];
    };
  },
};

const formatTimestamp: MenuOption = {
  key: "4",
  label: "Format a timestamp",
  async prepare(ask, context) {
    const date = parseDateInput(await ask("Date (YYYY-MM-DD)"));
    const time = parseTimeInput(await ask("Time (HH:MM, 24-hour)"));
    const zone = chooseZone(await ask(ZONE_PROMPT), context);
    const presetNames = Object.keys(context.presets).join(", ");
    const preset = resolveFormatChoice(await ask(`Preset (${presetNames}) or pattern`), context.presets);

    return () => [
      `Formatted time: ${formatWithPreset(fromWallClock(date, time, zone.zone), preset)}`,
    ];
  },
};

const zoneDifference: MenuOption = {
  key: "5",
  label: "Time difference between two time zones",
  async prepare(ask, context) {
    const first = chooseZone(await ask("First time zone"), context);
    const second = chooseZone(await ask("Second time zone"), context);
    const dateInput = await ask("Date (YYYY-MM-DD, blank for now)");
    const date = dateInput ? parseDateInput(dateInput) : null;

    return () => {
      // A given date is compared at noon in the second zone, clear of midnight transitions
      const at = date
        ? fromWallClock(date, { hour: 12, minute: 0 }, second.zone)
        : context.timeSource.getCurrentUtc();
      const difference = calculateDifference(first.zone, second.zone, at);
      const localTimes = date
        ? []
        : [first, second].map(
            (choice) =>
              `Current time in ${choice.label}: ${display(convert(at, choice.zone), choice.preset)}`,
          );

      const relation =
        difference.sign > 0
          ? `${first.label} is ahead of ${second.label}`
          : difference.sign < 0
            ? `${first.label} is behind ${second.label}`
            : `${first.label} and ${second.label} show the same time`;

      return [...localTimes, `Time difference: ${describeDifference(difference)}`, relation];
    };
  },
};

const worldClock: MenuOption = {
  key: "6",
  label: "World clock",
  async prepare(_ask, { timeSource, presets, cities }) {
    return () => {
      const now = timeSource.getCurrentUtc();
      return [
        "World clock:",
        ...cities.map(
          (city) =>
            `${city.name}: ${display(convert(now, city.zone), findPreset(city.preset, presets))}`,
        ),
      ];
    };
  },
};

const flightPlanner: MenuOption = {
  key: "7",
  label: "Plan a flight",
  async prepare(ask, context) {
    const departure = chooseZone(await ask("Departure city or time zone"), context);
    const arrival = chooseZone(await ask("Arrival city or time zone"), context);
    const date = parseDateInput(await ask("Departure date (YYYY-MM-DD)"));
    const time = parseTimeInput(await ask("Departure time (HH:MM, 24-hour)"));
    const hours = parseDurationHours(await ask("Flight duration in hours (e.g. 8.5)"));

    return () => {
      const departsAt = fromWallClock(date, time, departure.zone);
      const arrivesAt = convert(shiftMinutes(departsAt, Math.round(hours * 60)), arrival.zone);
      const difference = calculateDifference(arrival.zone, departure.zone, departsAt);

      return [
        `Flight: ${departure.label} to ${arrival.label}`,
        `Departure: ${display(departsAt, departure.preset)}`,
        `Arrival: ${display(arrivesAt, arrival.preset)}`,
        `Time difference: ${describeDifference(difference)}`,
      ];
    };
  },
};

export const MENU_OPTIONS: readonly MenuOption[] = [
  currentUtc,
  currentInZone,
  convertTimestamp,
  formatTimestamp,
  zoneDifference,
  worldClock,
  flightPlanner,
];
