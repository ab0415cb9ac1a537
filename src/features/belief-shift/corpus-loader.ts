import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { withSpan, logInfo, countMetric } from "@/lib/telemetry";
import { CorpusError, describeError } from "./errors";
import { corpusYamlSchema } from "./schemas";
import type { Proposition } from "./types";

export const DEFAULT_CORPUS_PATH = fileURLToPath(new URL("./corpus/default.yaml", import.meta.url));

/**
 * Parse and validate corpus YAML text. Throws CorpusError with every
 * validation issue listed.
 */
export function parseCorpus(raw: string, source = "corpus"): Proposition[] {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new CorpusError(`${source} is not valid YAML: ${describeError(error)}`, { cause: error });
  }

  const result = corpusYamlSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CorpusError(`${source} is invalid: ${issues}`);
  }

  return result.data.propositions.map((p) =>
    Object.freeze({ id: p.id, text: p.text, groundTruth: p.ground_truth }),
  );
}

/**
 * Load a corpus YAML file from disk.
 */
export async function loadCorpus(filePath: string = DEFAULT_CORPUS_PATH): Promise<Proposition[]> {
  return withSpan("corpus-loader.load", "belief_shift.load", async () => {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error) {
      throw new CorpusError(`cannot read corpus ${filePath}: ${describeError(error)}`, { cause: error });
    }

    const propositions = parseCorpus(raw, filePath);

    logInfo("corpus loaded", { filePath, propositionCount: propositions.length });
    countMetric("belief_shift.propositions_loaded", propositions.length);

    return propositions;
  });
}
