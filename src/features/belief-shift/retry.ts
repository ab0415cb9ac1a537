import { setTimeout as delay } from "node:timers/promises";
import { logWarn, countMetric } from "@/lib/telemetry";
import { FatalRemoteError, RetriesExhaustedError, TransientRemoteError } from "./errors";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_SECONDS = 60;

const TRANSIENT_MARKERS = ["rate limit", "429", "503", "overloaded"] as const;

export type FailureClass = "transient" | "fatal";

export interface RetryOptions {
  maxAttempts?: number;
  backoffSeconds?: number;
  /** Names the call in retry logs. */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export type CallResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; kind: "fatal"; error: FatalRemoteError; attempts: number }
  | { ok: false; kind: "retries_exhausted"; error: RetriesExhaustedError; attempts: number };

function failureDescription(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Tags a remote failure by substring match on its description. Providers
 * report throttling and overload inconsistently, so the text is the only
 * signal common to all of them.
 */
export function classifyFailure(error: unknown): FailureClass {
  const description = failureDescription(error).toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => description.includes(marker))
    ? "transient"
    : "fatal";
}

function defaultSleep(ms: number): Promise<void> {
  return delay(ms).then(() => undefined);
}

/**
 * Runs `operation` until it succeeds, fails fatally, or has failed
 * transiently `maxAttempts` times. Waits a fixed `backoffSeconds` between
 * attempts; never after the last one.
 */
export async function callWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<CallResult<T>> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const backoffSeconds = options.backoffSeconds ?? DEFAULT_BACKOFF_SECONDS;
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? "remote call";

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let attempt = 0;
  let lastFailure: TransientRemoteError | undefined;

  while (attempt < maxAttempts) {
    attempt++;
    try {
      const value = await operation();
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (classifyFailure(error) === "fatal") {
        return {
          ok: false,
          kind: "fatal",
          error: new FatalRemoteError(`${label} failed: ${failureDescription(error)}`, { cause: error }),
          attempts: attempt,
        };
      }

      lastFailure = new TransientRemoteError(failureDescription(error), { cause: error });
      countMetric("belief_shift.remote.transient_failure", 1, { label });

      if (attempt < maxAttempts) {
        logWarn(`[Retry ${attempt}/${maxAttempts}] ${label} hit a transient failure; sleeping ${backoffSeconds}s`, {
          label,
          attempt,
          maxAttempts,
          waitSeconds: backoffSeconds,
          reason: failureDescription(error),
        });
        await sleep(backoffSeconds * 1000);
      }
    }
  }

  return {
    ok: false,
    kind: "retries_exhausted",
    error: new RetriesExhaustedError(
      `${label} failed after ${attempt} attempts: ${lastFailure?.message ?? "no attempt made"}`,
      attempt,
      { cause: lastFailure },
    ),
    attempts: attempt,
  };
}

/** Returns the success value or throws the failure the result carries. */
export function unwrapCallResult<T>(result: CallResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
