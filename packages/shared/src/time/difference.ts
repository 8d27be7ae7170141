import type { DifferenceSign, Instant, TimeDifference } from '../types';
import { getZoneOffsetMs } from '../utils/time';
import { requireZone } from './instant';
import { resolveZone } from './zone';

const MS_PER_MINUTE = 60_000;

/**
 * Offset of `zone1` minus offset of `zone2` at `at`.
 *
 * Offsets move with daylight-saving rules, so the instant is always explicit;
 * callers wanting "now" pass the current instant. The sign lives only in
 * `sign` and `totalMinutes`; `hours` and `minutes` are magnitudes.
 */
export function calculateDifference(zone1: string, zone2: string, at: Instant): TimeDifference {
  const first = resolveZone(zone1);
  const second = resolveZone(zone2);
  const { epochMs } = requireZone(at);

  const offsetMs = getZoneOffsetMs(first, epochMs) - getZoneOffsetMs(second, epochMs);
  // Truncate toward zero; `|| 0` drops -0.
  const totalMinutes = Math.trunc(offsetMs / MS_PER_MINUTE) || 0;

  const sign: DifferenceSign = totalMinutes > 0 ? 1 : totalMinutes < 0 ? -1 : 0;
  const magnitude = Math.abs(totalMinutes);

  return {
    sign,
    hours: Math.floor(magnitude / 60),
    minutes: magnitude % 60,
    totalMinutes,
  };
}

function countOf(value: number, unit: string): string {
  return `${value} ${value === 1 ? unit : `${unit}s`}`;
}

/** e.g. "5 hours 0 minutes", "-0 hours 30 minutes" */
export function describeDifference(difference: TimeDifference): string {
  const sign = difference.sign < 0 ? '-' : '';
  return `${sign}${countOf(difference.hours, 'hour')} ${countOf(difference.minutes, 'minute')}`;
}
