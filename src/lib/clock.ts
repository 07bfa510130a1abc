// src/lib/clock.ts
// Wall-clock access point. Only metadata timestamps and the future-date check read it.

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
