import { performance } from 'node:perf_hooks';
import type { ClockPort } from '@/ports/ClockPort';

/**
 * Monotonic milliseconds, unaffected by wall-clock adjustments.
 */
export const systemClock: ClockPort = {
  now: () => performance.now(),
};
