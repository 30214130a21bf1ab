import { setTimeout as sleepFor } from "node:timers/promises";
import {
  PermanentExtractionFailure,
  TransientRemoteError,
  errorMessage,
} from "../errors.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  // Per attempt. Expiry counts as a transient failure.
  timeoutMs?: number;
  label?: string;
  signal?: AbortSignal;
}

export interface RetryExecutorOptions {
  maxAttempts: number;
  baseDelayMs: number;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryableOperation<T> = (signal: AbortSignal) => Promise<T>;

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleepFor(ms, undefined, { signal });
};

export class RetryExecutor {
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly defaults: RetryExecutorOptions) {
    this.random = defaults.random ?? Math.random;
    this.sleep = defaults.sleep ?? defaultSleep;
  }

  // base * 2^attempt, scaled by a jitter factor in [0.5, 1.0]
  backoffDelay(attempt: number, baseDelayMs = this.defaults.baseDelayMs): number {
    const jitter = 0.5 + 0.5 * this.random();
    return baseDelayMs * 2 ** attempt * jitter;
  }

  async run<T>(
    operation: RetryableOperation<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.defaults.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? this.defaults.baseDelayMs;
    const label = options.label ?? "operation";
    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      options.signal?.throwIfAborted();

      try {
        return await this.attempt(operation, options.timeoutMs, options.signal);
      } catch (error) {
        lastError = error;

        if (error instanceof PermanentExtractionFailure || options.signal?.aborted) {
          throw error;
        }

        if (attempt === maxAttempts - 1) break;

        const delay = this.backoffDelay(attempt, baseDelayMs);
        console.warn(
          `🔁 [RETRY] label=${label} attempt=${attempt + 1}/${maxAttempts} delay=${Math.round(delay)}ms error=${errorMessage(error)}`
        );
        await this.sleep(delay, options.signal);
      }
    }

    console.error(
      `❌ [RETRY_EXHAUSTED] label=${label} attempts=${maxAttempts} error=${errorMessage(lastError)}`
    );
    throw lastError;
  }

  private async attempt<T>(
    operation: RetryableOperation<T>,
    timeoutMs: number | undefined,
    outerSignal: AbortSignal | undefined
  ): Promise<T> {
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(outerSignal?.reason);
    outerSignal?.addEventListener("abort", onOuterAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const guards: Promise<never>[] = [];

    if (timeoutMs !== undefined && timeoutMs > 0) {
      guards.push(
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            const timeoutError = new TransientRemoteError(
              `Timed out after ${timeoutMs}ms`
            );
            reject(timeoutError);
            controller.abort(timeoutError);
          }, timeoutMs);
        })
      );
    }

    try {
      return await Promise.race([operation(controller.signal), ...guards]);
    } finally {
      if (timer) clearTimeout(timer);
      outerSignal?.removeEventListener("abort", onOuterAbort);
    }
  }
}
