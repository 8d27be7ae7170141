import { addMinutes } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';

import { NaiveInstantError } from '../errors';
import type { CalendarDate, Instant, WallTime, ZonedInstant } from '../types';
import { resolveZone } from './zone';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function createInstant(epochMs: number, zone: string): ZonedInstant {
  return Object.freeze({ epochMs, zone: resolveZone(zone) });
}

/**
 * A wall-clock reading with no zone attached. Only useful as input that
 * zone-aware operations will refuse.
 */
export function naiveInstant(epochMs: number): Instant {
  return Object.freeze({ epochMs, zone: null });
}

export function requireZone(instant: Instant): ZonedInstant {
  const { epochMs, zone } = instant;
  if (!zone) {
    throw new NaiveInstantError(epochMs);
  }
  return Object.freeze({ epochMs, zone });
}

/**
 * The instant at which clocks in `zone` read `date` `time`.
 *
 * Readings inside a spring-forward gap resolve past the gap; readings in a
 * fall-back overlap resolve to the first occurrence.
 */
export function fromWallClock(date: CalendarDate, time: WallTime, zone: string): ZonedInstant {
  const target = resolveZone(zone);
  const wallClock =
    `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}` +
    `T${pad(time.hour)}:${pad(time.minute)}:00`;

  return Object.freeze({ epochMs: fromZonedTime(wallClock, target).getTime(), zone: target });
}

export function shiftMinutes(instant: Instant, minutes: number): ZonedInstant {
  const { epochMs, zone } = requireZone(instant);
  return Object.freeze({ epochMs: addMinutes(epochMs, minutes).getTime(), zone });
}
