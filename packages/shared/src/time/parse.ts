import { InvalidDateFormatError, InvalidDurationError, InvalidTimeFormatError } from '../errors';
import { calendarDateSchema, durationHoursSchema, wallTimeSchema } from '../schemas';
import type { CalendarDate, WallTime } from '../types';

/** "YYYY-MM-DD"; the date must exist on the calendar. */
export function parseDateInput(input: string): CalendarDate {
  const result = calendarDateSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidDateFormatError(input);
  }
  return result.data;
}

/** "HH:MM", 24-hour clock. */
export function parseTimeInput(input: string): WallTime {
  const result = wallTimeSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidTimeFormatError(input);
  }
  return result.data;
}

export function parseDurationHours(input: string): number {
  const result = durationHoursSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidDurationError(input);
  }
  return result.data;
}
