export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  onRetry?: (error: Error, attempt: number) => void;
  /** Return false to surface the error without further attempts. */
  shouldRetry?: (error: Error) => boolean;
  signal?: AbortSignal;
}

export interface TimeoutOptions {
  timeoutMs: number;
  timeoutMessage?: string;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

const DEFAULT_TIMEOUT_OPTIONS: TimeoutOptions = {
  timeoutMs: 30000,
};

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class CancelledError extends Error {
  constructor(message: string = "Operation cancelled by caller") {
    super(message);
    this.name = "CancelledError";
  }
}

export class RetriesExhaustedError extends Error {
  constructor(public readonly lastError: Error, public readonly attempts: number) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetriesExhaustedError";
  }
}

/**
 * Runs `operation` with a deadline. The operation receives a signal that is
 * aborted when the deadline passes or the caller's own signal fires, so the
 * underlying request can be torn down rather than left running.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: Partial<TimeoutOptions> = {}
): Promise<T> {
  const { timeoutMs, timeoutMessage, signal } = { ...DEFAULT_TIMEOUT_OPTIONS, ...options };

  if (signal?.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onCallerAbort = () => {
      clearTimeout(timer);
      controller.abort();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onCallerAbort);
      controller.abort();
      reject(new TimeoutError(timeoutMessage || `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    signal?.addEventListener("abort", onCallerAbort, { once: true });

    operation(controller.signal)
      .then((result) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onCallerAbort);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onCallerAbort);
        reject(error);
      });
  });
}

/**
 * Retries with exponential backoff. Errors rejected by `shouldRetry` are
 * rethrown as-is; running out of attempts throws RetriesExhaustedError.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | undefined;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    if (opts.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError instanceof CancelledError) {
        throw lastError;
      }
      if (opts.shouldRetry && !opts.shouldRetry(lastError)) {
        throw lastError;
      }
      if (attempt === opts.maxAttempts) {
        throw new RetriesExhaustedError(lastError, attempt);
      }

      if (opts.onRetry) {
        opts.onRetry(lastError, attempt);
      }

      await sleep(delay, opts.signal);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw new RetriesExhaustedError(lastError ?? new Error("No attempts made"), opts.maxAttempts);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
