export const CLOCK = Symbol('CLOCK');

/** Source of the current time for timestamps. */
export interface Clock {
  now(): Date;
}
