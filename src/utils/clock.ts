/** Injectable clock so time-dependent code can be tested */
export interface Clock {
  /** Current time in milliseconds since epoch */
  now(): number;
}

export const SYSTEM_CLOCK: Clock = { now: () => Date.now() };
