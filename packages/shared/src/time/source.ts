import type { NowProvider, ZonedInstant } from '../types';
import { createInstant } from './instant';

export const systemNow: NowProvider = () => Date.now();

/** Clock frozen at `at`. */
export function fixedNow(at: Date | number): NowProvider {
  const epochMs = typeof at === 'number' ? at : at.getTime();
  return () => epochMs;
}

export class TimeSource {
  constructor(private readonly now: NowProvider = systemNow) {}

  getCurrentUtc(): ZonedInstant {
    return createInstant(this.now(), 'UTC');
  }

  getCurrentInZone(zone: string): ZonedInstant {
    return createInstant(this.now(), zone);
  }
}
