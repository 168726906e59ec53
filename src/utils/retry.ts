/**
 * Retry with exponential backoff.
 *
 * The caller decides which failures are transient through `isRetryable`;
 * anything else is rethrown after the first attempt. Waits start at
 * `initialDelayMs` and grow by `backoffMultiplier` up to `maxDelayMs`.
 */

export interface RetryConfig {
  /** Total attempts, first call included */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  isRetryable: (error: unknown) => boolean;
  /** Stops scheduling further attempts once aborted */
  signal?: AbortSignal;
  /** Called for every failed attempt, before the wait */
  onAttemptFailed?: (context: RetryAttemptContext) => void;
}

export type BackoffSettings = Pick<RetryConfig, 'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>;

export interface RetryAttemptContext {
  /** Zero-based index of the attempt that failed */
  attempt: number;
  /** Wait before the next attempt, null when none follows */
  delayMs: number | null;
  error: unknown;
}

export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Waits between attempts: [1000, 2000, 4000] for an initial delay of 1000,
 * multiplier 2, ceiling 4000 and four attempts.
 */
export function backoffSchedule(settings: BackoffSettings): number[] {
  const schedule: number[] = [];
  let wait = settings.initialDelayMs;
  while (schedule.length < settings.maxAttempts - 1) {
    schedule.push(wait);
    wait = Math.min(settings.maxDelayMs, Math.round(wait * settings.backoffMultiplier));
  }
  return schedule;
}

/**
 * Run `fn` until it resolves, a failure is not retryable, or attempts run
 * out. `fn` receives the zero-based attempt index; the last failure is
 * rethrown as is.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig
): Promise<T> {
  assertValid(config);

  const schedule = backoffSchedule(config);
  let attempt = 0;

  for (;;) {
    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      const wait = attempt < schedule.length && !(error instanceof RetryAbortedError) && config.isRetryable(error)
        ? schedule[attempt]
        : null;

      config.onAttemptFailed?.({ attempt, delayMs: wait, error });

      if (wait === null) {
        throw error;
      }

      await sleep(wait, config.signal);
      attempt++;
    }
  }
}

function assertValid(config: RetryConfig): void {
  if (config.maxAttempts < 1) {
    throw new Error('maxAttempts must be >= 1');
  }
  if (config.initialDelayMs < 0) {
    throw new Error('initialDelayMs must be >= 0');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new Error('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new Error('backoffMultiplier must be >= 1');
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new RetryAbortedError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
