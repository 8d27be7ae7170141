import type { Instant, ZonedInstant } from '../types';
import { createInstant, requireZone } from './instant';

/**
 * Re-express `instant` in `targetZone`. The epoch value never changes,
 * only the zone it is displayed in.
 */
export function convert(instant: Instant, targetZone: string): ZonedInstant {
  const { epochMs } = requireZone(instant);
  return createInstant(epochMs, targetZone);
}
