/**
 * Wall-clock helpers for timing a simulation run. Kept outside the simulator so the
 * hot loop never touches the clock.
 */

/** Result of {@link timed}. */
export interface Timed<T> {
  result: T;
  /** Elapsed wall-clock milliseconds measured with `performance.now()`. */
  elapsedMs: number;
}

/** Run `fn` and measure how long it took. */
export function timed<T>(fn: () => T): Timed<T> {
  const start = performance.now();
  const result = fn();
  return { result, elapsedMs: performance.now() - start };
}

/**
 * Human readable duration.
 *
 * @example
 * formatDuration(12.345);   // '12.345ms'
 * formatDuration(1500);     // '1.500s'
 * formatDuration(125_250);  // '2m 5.250s'
 */
export function formatDuration(ms: number): string {
  const fine = Number(ms.toFixed(3));
  if (fine < 1000) return `${fine}ms`;
  // round before splitting: 59_999.9 -> '1m 0.000s'
  const whole = Math.round(ms);
  if (whole < 60_000) return `${(whole / 1000).toFixed(3)}s`;
  const minutes = Math.floor(whole / 60_000);
  return `${minutes}m ${((whole - minutes * 60_000) / 1000).toFixed(3)}s`;
}
