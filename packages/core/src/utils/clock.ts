/**
 * @fileoverview Time source
 *
 * Everything that reads "now" goes through a Clock so timers and expiry can
 * be driven by a manual clock in tests.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
