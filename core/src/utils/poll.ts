import { ErrorCode } from '../types';
import { PrinterError } from './error-handler';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface PollStep<T> {
  done: boolean;
  value: T;
}

export interface PollOptions<T> {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  timeoutMessage: (last: T) => string;
}

/**
 * Calls `check` until it reports `done`, sleeping `intervalMs` between
 * attempts. The first check happens immediately. Throws a TIMEOUT
 * PrinterError once more than `timeoutMs` has elapsed since the start.
 */
export async function pollUntil<T>(
  check: () => Promise<PollStep<T>>,
  options: PollOptions<T>
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();

  for (;;) {
    const step = await check();
    if (step.done) {
      return step.value;
    }
    if (clock.now() - startedAt > options.timeoutMs) {
      throw new PrinterError(ErrorCode.Timeout, options.timeoutMessage(step.value), {
        details: { timeoutMs: options.timeoutMs, last: step.value },
      });
    }
    await clock.sleep(options.intervalMs);
  }
}

export function withinTolerance(value: number, target: number, tolerance: number): boolean {
  return Math.abs(value - target) <= tolerance;
}
