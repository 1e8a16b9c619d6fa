/**
 * Polling primitives
 *
 * `pollUntil` is the single wait primitive for lifecycle transitions:
 * readiness after session creation and worker exit after an interrupt.
 * It polls with exponential backoff and gives up after a bounded timeout.
 *
 * @module
 */

/**
 * Options for pollUntil
 */
export interface PollOptions {
  /** Give up after this many milliseconds */
  readonly timeoutMs: number;
  /** Delay before the second attempt (default: 100) */
  readonly initialDelayMs?: number;
  /** Upper bound for the delay between attempts (default: 2000) */
  readonly maxDelayMs?: number;
  /** Multiplier applied to the delay after each attempt (default: 2) */
  readonly factor?: number;
}

/**
 * Outcome of a poll
 */
export interface PollResult {
  /** Whether the predicate became true before the timeout */
  readonly satisfied: boolean;
  /** Number of times the predicate was evaluated */
  readonly attempts: number;
  /** Wall-clock time spent */
  readonly elapsedMs: number;
}

/**
 * Sleeps for the given number of milliseconds. Zero resolves on the next tick.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Evaluates `predicate` until it returns true or the timeout elapses.
 *
 * The predicate is always evaluated at least once, even with a zero timeout.
 * A predicate that throws counts as "not yet".
 */
export async function pollUntil(
  predicate: () => Promise<boolean>,
  options: PollOptions
): Promise<PollResult> {
  const initialDelay = options.initialDelayMs ?? 100;
  const maxDelay = options.maxDelayMs ?? 2000;
  const factor = options.factor ?? 2;
  const startTime = Date.now();

  let delay = initialDelay;
  let attempts = 0;

  for (;;) {
    attempts++;
    let satisfied = false;
    try {
      satisfied = await predicate();
    } catch {
      satisfied = false;
    }
    const elapsedMs = Date.now() - startTime;
    if (satisfied) {
      return { satisfied: true, attempts, elapsedMs };
    }

    const remaining = options.timeoutMs - elapsedMs;
    if (remaining <= 0) {
      return { satisfied: false, attempts, elapsedMs };
    }

    await sleep(Math.min(delay, remaining));
    delay = Math.min(maxDelay, delay * factor);
  }
}
