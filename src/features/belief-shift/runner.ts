import { withSpan, logInfo, logError, logChunked, countMetric } from "@/lib/telemetry";
import { runDebate } from "./debate";
import { describeError, isBeliefShiftError } from "./errors";
import {
  generateExperimentReport,
  formatResultsTable,
  formatSummaryTable,
  type ExperimentReport,
} from "./experiment-report";
import { sideLabel } from "./prompt-builder";
import { summarizeShifts } from "./statistics";
import type { Generator } from "./generator";
import type {
  ArguerStyle,
  DebateConfig,
  ExperimentConfig,
  ExperimentProgress,
  FailedDebateRecord,
  Proposition,
  ResultRecord,
} from "./types";

export const ARGUER_STYLES: readonly ArguerStyle[] = ["default", "aggressive"];
export const SIDES: readonly boolean[] = [true, false];

/** Credence before, one call per turn, credence after. */
const CALLS_PER_ROUND = 2;
const CREDENCE_CALLS_PER_DEBATE = 2;

export type RunnerConfig = Pick<
  ExperimentConfig,
  "model" | "rounds" | "maxAttempts" | "backoffSeconds" | "failurePolicy" | "seed"
>;

export interface RunnerDependencies {
  generator: Generator;
  sleep?: (ms: number) => Promise<void>;
  /** Used for the shuffle when no seed is configured. */
  random?: () => number;
  onProgress?: (progress: ExperimentProgress) => void;
}

export interface DryRunResult {
  dryRun: true;
  model: string;
  propositions: number;
  totalDebates: number;
  remoteCalls: number;
  rounds: number;
  seed?: number | undefined;
}

// Seeded PRNG (xorshift32) for deterministic ordering
export function createRng(seed: number): () => number {
  let state = seed | 0 || 1;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

export function shuffleArray<T>(rng: () => number, arr: readonly T[]): T[] {
  const result = [...arr];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [result[i], result[j]] = [result[j] as T, result[i] as T];
  }
  return result;
}

/** Every (proposition, style, side) combination, in run order. */
export function buildDebateGrid(propositions: readonly Proposition[], rounds: number): DebateConfig[] {
  const grid: DebateConfig[] = [];
  for (const proposition of propositions) {
    for (const arguerStyle of ARGUER_STYLES) {
      for (const side of SIDES) {
        grid.push({ proposition, side, arguerStyle, rounds });
      }
    }
  }
  return grid;
}

export function toResultRecord(config: DebateConfig, credStart: number, credEnd: number): ResultRecord {
  return Object.freeze({
    proposition: config.proposition.text,
    groundTruth: config.proposition.groundTruth,
    side: sideLabel(config.side),
    style: config.arguerStyle,
    credStart,
    credEnd,
    shift: credEnd - credStart,
  });
}

function toFailedRecord(config: DebateConfig, error: unknown): FailedDebateRecord {
  return Object.freeze({
    proposition: config.proposition.text,
    groundTruth: config.proposition.groundTruth,
    side: sideLabel(config.side),
    style: config.arguerStyle,
    errorTag: isBeliefShiftError(error) ? error._tag : error instanceof Error ? error.name : "UnknownError",
    message: error instanceof Error ? error.message : String(error),
  });
}

export function planExperiment(propositions: readonly Proposition[], config: RunnerConfig): DryRunResult {
  const totalDebates = propositions.length * ARGUER_STYLES.length * SIDES.length;
  return {
    dryRun: true,
    model: config.model,
    propositions: propositions.length,
    totalDebates,
    remoteCalls: totalDebates * (config.rounds * CALLS_PER_ROUND + CREDENCE_CALLS_PER_DEBATE),
    rounds: config.rounds,
    seed: config.seed,
  };
}

/**
 * Shuffles the corpus once, then runs one debate per (proposition, style,
 * side) sequentially. Under the `abort` policy the first failing debate ends
 * the run; under `record` it is kept as a failed entry and the run goes on.
 */
export async function runExperiment(
  corpus: readonly Proposition[],
  config: RunnerConfig,
  deps: RunnerDependencies,
): Promise<ExperimentReport> {
  return withSpan("experiment.run", "belief_shift.experiment", async () => {
    const rng = config.seed !== undefined ? createRng(config.seed) : (deps.random ?? Math.random);
    const propositions = shuffleArray(rng, corpus);
    const grid = buildDebateGrid(propositions, config.rounds);

    logInfo("Starting experiment", {
      model: config.model,
      propositions: propositions.length,
      debates: grid.length,
      rounds: config.rounds,
      failurePolicy: config.failurePolicy,
      seed: config.seed ?? "random",
    });

    const records: ResultRecord[] = [];
    const failures: FailedDebateRecord[] = [];
    let currentProposition: string | undefined;
    let currentStyle: ArguerStyle | undefined;

    for (const debate of grid) {
      if (debate.proposition.id !== currentProposition) {
        currentProposition = debate.proposition.id;
        currentStyle = undefined;
        logInfo(`=== Proposition: ${debate.proposition.text} (correct=${debate.proposition.groundTruth}) ===`);
      }
      if (debate.arguerStyle !== currentStyle) {
        currentStyle = debate.arguerStyle;
        logInfo(`--- Debating style: ${debate.arguerStyle} ---`);
      }
      logInfo(`** Side: ${sideLabel(debate.side)} **`);

      try {
        const outcome = await runDebate(debate, {
          generator: deps.generator,
          model: config.model,
          retry: {
            maxAttempts: config.maxAttempts,
            backoffSeconds: config.backoffSeconds,
            ...(deps.sleep && { sleep: deps.sleep }),
          },
        });
        const record = toResultRecord(debate, outcome.credStart, outcome.credEnd);
        records.push(record);
        logInfo("debate.result", { ...record });
      } catch (error) {
        logError("Debate failed", {
          proposition: debate.proposition.id,
          style: debate.arguerStyle,
          side: sideLabel(debate.side),
          error: describeError(error),
        });
        countMetric("belief_shift.debate.failed", 1, { style: debate.arguerStyle });
        if (config.failurePolicy === "abort") {
          throw error;
        }
        failures.push(toFailedRecord(debate, error));
      }

      deps.onProgress?.({
        debatesCompleted: records.length,
        debatesFailed: failures.length,
        debatesTotal: grid.length,
      });
    }

    const summary = summarizeShifts(records);
    logChunked("experiment.results", formatResultsTable(records));
    logChunked("experiment.summary", formatSummaryTable(summary));
    countMetric("belief_shift.experiment.completed", 1);

    return generateExperimentReport({
      model: config.model,
      rounds: config.rounds,
      seed: config.seed,
      records,
      failures,
      summary,
    });
  });
}
