/**
 * Controllable time source for throttle and timestamp tests
 */

export interface ManualClock {
  /** Current time in epoch milliseconds; pass as `clock` */
  (): number;
  /** Move time forward */
  advance(ms: number): void;
  /** Jump to an absolute time */
  set(ms: number): void;
}

/**
 * Create a clock that only moves when told to
 * @param start - Initial epoch milliseconds (default: 2024-01-15T10:30:00.000Z)
 */
export function manualClock(start = Date.UTC(2024, 0, 15, 10, 30, 0)): ManualClock {
  let current = start;
  const clock = () => current;
  return Object.assign(clock, {
    advance(ms: number) {
      current += ms;
    },
    set(ms: number) {
      current = ms;
    },
  });
}
