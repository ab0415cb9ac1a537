import { logChunked, logInfo } from "@/lib/telemetry";
import { MalformedCredenceError } from "./errors";
import { buildCredenceAskerInstruction, renderTranscript } from "./prompt-builder";
import { callWithRetry, unwrapCallResult, type RetryOptions } from "./retry";
import type { Generator } from "./generator";
import type { Transcript } from "./types";

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a bare percentage reply such as `"73"`, `"73%"` or `" 73. "`.
 * Surrounding whitespace and any run of trailing `%` and `.` characters are
 * dropped; what remains must be a plain number in [0, 100].
 */
export function parseCredence(raw: string): number {
  const cleaned = raw.trim().replace(/[%.]+$/, "").trim();

  if (!NUMBER_PATTERN.test(cleaned)) {
    throw new MalformedCredenceError(`Credence reply is not a number: "${raw}"`, raw);
  }

  const value = Number(cleaned);
  if (value < 0 || value > 100) {
    throw new MalformedCredenceError(`Credence ${value} is outside 0-100: "${raw}"`, raw);
  }
  return value;
}

export interface CredenceContext {
  generator: Generator;
  model: string;
  retry?: RetryOptions;
}

/**
 * An empty history sends the bare question; otherwise the whole transcript
 * is rendered ahead of it.
 */
export function buildCredenceContents(question: string, history: Transcript): string {
  return history.length === 0 ? question : renderTranscript(history, question);
}

export async function askCredence(
  question: string,
  history: Transcript,
  context: CredenceContext,
): Promise<number> {
  const contents = buildCredenceContents(question, history);
  const systemInstruction = buildCredenceAskerInstruction();

  logChunked("credence.input", contents, { historyTurns: history.length });

  const result = await callWithRetry(
    () => context.generator.generate({ model: context.model, systemInstruction, contents }),
    { ...context.retry, label: "credence" },
  );
  const raw = unwrapCallResult(result);

  logInfo("credence.reply", { raw, attempts: result.attempts });
  return parseCredence(raw);
}
