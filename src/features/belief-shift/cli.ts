import { writeFile } from "node:fs/promises";
import * as Sentry from "@sentry/node";
import { createAnthropicClient } from "@/lib/anthropic";
import { loadEnvFiles, loadExperimentConfig, type ConfigOverrides } from "./config";
import { loadCorpus } from "./corpus-loader";
import { describeError } from "./errors";
import { formatReport, type ExperimentReport } from "./experiment-report";
import { createAnthropicGenerator } from "./generator";
import { planExperiment, runExperiment, type DryRunResult } from "./runner";

interface CliArgs {
  overrides: ConfigOverrides;
  dryRun: boolean;
  output?: string;
}

const VALUE_FLAGS: Record<string, keyof ConfigOverrides> = {
  "--model": "model",
  "--rounds": "rounds",
  "--seed": "seed",
  "--corpus": "corpusPath",
  "--max-attempts": "maxAttempts",
  "--backoff": "backoffSeconds",
  "--max-tokens": "maxTokens",
  "--failure-policy": "failurePolicy",
};

function parseArgs(args: string[]): CliArgs {
  const overrides: ConfigOverrides = {};
  let dryRun = false;
  let output: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === undefined) continue;

    const key = Object.hasOwn(VALUE_FLAGS, arg) ? VALUE_FLAGS[arg] : undefined;
    if (key !== undefined) {
      if (next === undefined) {
        throw new Error(`${arg} requires a value`);
      }
      overrides[key] = next;
      i++;
    } else if (arg === "--output") {
      if (next === undefined) {
        throw new Error("--output requires a value");
      }
      output = next;
      i++;
    } else if (arg === "--dry-run") {
      dryRun = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { overrides, dryRun, ...(output !== undefined && { output }) };
}

function isDryRunResult(result: ExperimentReport | DryRunResult): result is DryRunResult {
  return "dryRun" in result && result.dryRun;
}

async function execute(args: CliArgs): Promise<ExperimentReport | DryRunResult> {
  const config = loadExperimentConfig(process.env, args.overrides);
  const corpus = await loadCorpus(config.corpusPath);

  if (args.dryRun) {
    return planExperiment(corpus, config);
  }

  const generator = createAnthropicGenerator(createAnthropicClient(config.apiKey), {
    maxTokens: config.maxTokens,
  });
  return runExperiment(corpus, config, { generator });
}

/**
 * Sentry must be initialised before this module loads; the `experiment`
 * script preloads `sentry.server.config.ts` with `--import`.
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  loadEnvFiles();

  try {
    const args = parseArgs(argv);
    const result = await execute(args);
    const json = JSON.stringify(result, null, 2);

    if (isDryRunResult(result)) {
      process.stdout.write(json + "\n");
      return;
    }

    // Human-readable to stderr, JSON alone on stdout
    process.stderr.write(formatReport(result) + "\n");
    process.stdout.write(json + "\n");

    if (args.output) {
      await writeFile(args.output, json + "\n", "utf-8");
    }
  } catch (error) {
    Sentry.captureException(error);
    console.error("Experiment failed:", describeError(error));
    process.exitCode = 1;
  } finally {
    await Sentry.flush(2000);
  }
}

export { parseArgs, isDryRunResult, execute, main };

// Only run main when executed directly (not imported by tests)
if (process.argv[1]?.endsWith("cli.ts") || process.argv[1]?.endsWith("cli.js")) {
  void main();
}
