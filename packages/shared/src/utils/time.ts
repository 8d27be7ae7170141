/**
 * Zone database helpers.
 * Offsets are read from Intl.DateTimeFormat wall-clock parts, so they do not
 * depend on the host's own time zone.
 */

// Region/city names, UTC and Etc/* entries. Raw offsets such as "+05:00" are not zones.
const ZONE_NAME = /^[A-Za-z][A-Za-z0-9_+-]*(\/[A-Za-z0-9_+-]+)*$/;

const MS_PER_MINUTE = 60_000;

/**
 * Check whether `zone` names an entry of the host time zone database
 */
export function isKnownZone(zone: string): boolean {
  if (!ZONE_NAME.test(zone)) {
    return false;
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/** Like Date.UTC, without its mapping of years 0-99 to 1900-1999. */
function utcTimestamp(
  year: number,
  monthIndex: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

const wallClockFormatters = new Map<string, Intl.DateTimeFormat>();

function wallClockFormatter(zone: string): Intl.DateTimeFormat {
  let formatter = wallClockFormatters.get(zone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    wallClockFormatters.set(zone, formatter);
  }
  return formatter;
}

/**
 * UTC offset of `zone` at `epochMs`, in milliseconds (east of Greenwich is positive)
 *
 * @example
 * getZoneOffsetMs('Asia/Tokyo', Date.UTC(2025, 2, 19)); // 32_400_000
 */
export function getZoneOffsetMs(zone: string, epochMs: number): number {
  const parts = wallClockFormatter(zone).formatToParts(new Date(epochMs));
  const field = (type: Intl.DateTimeFormatPartTypes) =>
    parseInt(parts.find((p) => p.type === type)?.value || '0', 10);

  const wallClockAsUtc = utcTimestamp(
    field('year'),
    field('month') - 1,
    field('day'),
    field('hour'),
    field('minute'),
    field('second'),
  );

  // Intl has no milliseconds field; compare against the whole second
  return wallClockAsUtc - Math.floor(epochMs / 1000) * 1000;
}

/**
 * UTC offset of `zone` at `epochMs`, in minutes
 *
 * Historical offsets with a seconds component are truncated toward zero.
 *
 * @example
 * getZoneOffsetMinutes('Asia/Kolkata', Date.UTC(2025, 0, 1)); // 330
 */
export function getZoneOffsetMinutes(zone: string, epochMs: number): number {
  return Math.trunc(getZoneOffsetMs(zone, epochMs) / MS_PER_MINUTE) || 0;
}

/**
 * Check whether daylight-saving time is in effect in `zone` at `epochMs`
 *
 * The zone's standard offset is the smaller of its January and July offsets,
 * which holds in both hemispheres.
 */
export function isDaylightSaving(zone: string, epochMs: number): boolean {
  const year = new Date(epochMs).getUTCFullYear();
  const january = getZoneOffsetMinutes(zone, utcTimestamp(year, 0, 1));
  const july = getZoneOffsetMinutes(zone, utcTimestamp(year, 6, 1));

  if (january === july) {
    return false;
  }

  return getZoneOffsetMinutes(zone, epochMs) > Math.min(january, july);
}

/**
 * Render an offset in minutes as "+HH:MM" / "-HH:MM"
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const magnitude = Math.abs(offsetMinutes);
  const hours = String(Math.floor(magnitude / 60)).padStart(2, '0');
  const minutes = String(magnitude % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}
