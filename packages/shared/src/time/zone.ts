import { InvalidZoneError } from '../errors';
import { zoneIdentifierSchema } from '../schemas';
import type { ZoneIdentifier } from '../types';

/**
 * Validate a user-supplied zone name against the host time zone database.
 * Surrounding whitespace is dropped; the name is otherwise kept as given.
 */
export function resolveZone(zone: string): ZoneIdentifier {
  const result = zoneIdentifierSchema.safeParse(zone);
  if (!result.success) {
    throw new InvalidZoneError(zone);
  }
  return result.data;
}
