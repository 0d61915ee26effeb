/**
 * backend/src/shared/time/clock.ts
 *
 * WHY:
 * - Token timestamps are second-granularity epoch integers.
 * - Components that compare against "now" take a Clock so tests can pin time.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
