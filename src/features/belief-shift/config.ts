import { config as loadDotenv } from "dotenv";
import { DEFAULT_MODEL } from "@/lib/anthropic";
import { withSpan, logInfo } from "@/lib/telemetry";
import { DEFAULT_CORPUS_PATH } from "./corpus-loader";
import { ConfigurationError } from "./errors";
import { experimentConfigSchema } from "./schemas";
import type { ExperimentConfig } from "./types";

export type ConfigKey =
  | "model"
  | "rounds"
  | "maxAttempts"
  | "backoffSeconds"
  | "maxTokens"
  | "failurePolicy"
  | "seed"
  | "corpusPath";

/** Raw string values, as they arrive from the command line. */
export type ConfigOverrides = Partial<Record<ConfigKey, string>>;

const ENV_KEYS: Record<ConfigKey, string> = {
  model: "BELIEF_SHIFT_MODEL",
  rounds: "BELIEF_SHIFT_ROUNDS",
  maxAttempts: "BELIEF_SHIFT_MAX_ATTEMPTS",
  backoffSeconds: "BELIEF_SHIFT_BACKOFF_SECONDS",
  maxTokens: "BELIEF_SHIFT_MAX_TOKENS",
  failurePolicy: "BELIEF_SHIFT_FAILURE_POLICY",
  seed: "BELIEF_SHIFT_SEED",
  corpusPath: "BELIEF_SHIFT_CORPUS",
};

const CONFIG_KEYS = Object.keys(ENV_KEYS).filter(isConfigKey);

function isConfigKey(key: string): key is ConfigKey {
  return key in ENV_KEYS;
}

/**
 * Loads `.env.local`, then `.env`. Values already in the environment win.
 */
export function loadEnvFiles(): void {
  loadDotenv({ path: ".env.local" });
  loadDotenv();
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Resolves the run configuration: CLI overrides, then environment, then
 * defaults. Throws ConfigurationError listing every invalid field.
 */
export function loadExperimentConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ExperimentConfig {
  return withSpan("config.load", "belief_shift.config", () => {
    const raw: Record<string, string | undefined> = {};
    for (const key of CONFIG_KEYS) {
      raw[key] = nonEmpty(overrides[key]) ?? nonEmpty(env[ENV_KEYS[key]]);
    }
    raw.model ??= DEFAULT_MODEL;
    raw.corpusPath ??= DEFAULT_CORPUS_PATH;
    raw.apiKey = nonEmpty(env.ANTHROPIC_API_KEY);

    const result = experimentConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`Invalid experiment configuration: ${issues}`);
    }

    const resolved = result.data;
    logInfo("experiment config resolved", {
      model: resolved.model,
      rounds: resolved.rounds,
      maxAttempts: resolved.maxAttempts,
      backoffSeconds: resolved.backoffSeconds,
      failurePolicy: resolved.failurePolicy,
      corpusPath: resolved.corpusPath,
    });
    return resolved;
  });
}
