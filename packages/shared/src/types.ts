import type { z } from 'zod';

import type {
  calendarDateSchema,
  citySchema,
  formatPresetSchema,
  SUPPORTED_LOCALES,
  wallTimeSchema,
  zoneIdentifierSchema,
} from './schemas';

export type ZoneIdentifier = z.infer<typeof zoneIdentifierSchema>;

/**
 * A point in time. `zone` is null for a naive wall-clock reading,
 * which no conversion or formatting operation accepts.
 */
export interface Instant {
  readonly epochMs: number;
  readonly zone: ZoneIdentifier | null;
}

export interface ZonedInstant extends Instant {
  readonly zone: ZoneIdentifier;
}

export type FormatPattern = string;

export type LocaleCode = (typeof SUPPORTED_LOCALES)[number];

export interface FormatPreset extends z.infer<typeof formatPresetSchema> {
  name: string;
}

export type PresetTable = Readonly<Record<string, FormatPreset>>;

export type DifferenceSign = -1 | 0 | 1;

export interface TimeDifference {
  sign: DifferenceSign;
  hours: number;
  minutes: number;
  totalMinutes: number;
}

export type CalendarDate = z.infer<typeof calendarDateSchema>;
export type WallTime = z.infer<typeof wallTimeSchema>;
export type City = z.infer<typeof citySchema>;

/** Returns milliseconds since the Unix epoch. */
export type NowProvider = () => number;
