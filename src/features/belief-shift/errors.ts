/**
 * Failure taxonomy for an experiment run. Each class carries a literal `_tag`
 * so callers can switch on the kind without instanceof chains.
 */

export abstract class BeliefShiftError extends Error {
  abstract readonly _tag: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A remote failure matching the rate-limit/overload heuristic.
 */
export class TransientRemoteError extends BeliefShiftError {
  readonly _tag = "TransientRemoteError" as const;
}

/**
 * Any remote failure not matching the transient heuristic
 * (authentication, invalid arguments, unknown errors).
 */
export class FatalRemoteError extends BeliefShiftError {
  readonly _tag = "FatalRemoteError" as const;
}

export class RetriesExhaustedError extends BeliefShiftError {
  readonly _tag = "RetriesExhaustedError" as const;

  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: ErrorOptions) {
    super(message, options);
    this.attempts = attempts;
  }
}

/**
 * The credence reply could not be read as a number in [0, 100].
 */
export class MalformedCredenceError extends BeliefShiftError {
  readonly _tag = "MalformedCredenceError" as const;

  public readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.raw = raw;
  }
}

export class ConfigurationError extends BeliefShiftError {
  readonly _tag = "ConfigurationError" as const;
}

export class CorpusError extends BeliefShiftError {
  readonly _tag = "CorpusError" as const;
}

export function isBeliefShiftError(error: unknown): error is BeliefShiftError {
  return error instanceof BeliefShiftError;
}

/** Renders any thrown value as a single log-friendly line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
