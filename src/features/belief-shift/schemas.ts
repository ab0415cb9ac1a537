import { z } from "zod/v4";

const groundTruth = z
  .union([z.boolean(), z.null(), z.enum(["true", "false", "unknown"])])
  .transform((value) => {
    if (value === null || value === "unknown") return "unknown" as const;
    if (typeof value === "boolean") return value ? ("true" as const) : ("false" as const);
    return value;
  });

// --- Corpus YAML schema ---

export const corpusYamlSchema = z
  .object({
    propositions: z
      .array(
        z.object({
          id: z.string().min(1),
          text: z.string().min(1),
          ground_truth: groundTruth,
        }),
      )
      .min(1),
  })
  .superRefine((corpus, ctx) => {
    const seen = new Set<string>();
    corpus.propositions.forEach((p, index) => {
      if (seen.has(p.id)) {
        ctx.addIssue({
          code: "custom",
          message: `duplicate proposition id "${p.id}"`,
          path: ["propositions", index, "id"],
        });
      }
      seen.add(p.id);
    });
  });

// --- Experiment configuration schema ---

export const failurePolicySchema = z.enum(["abort", "record"]);

export const experimentConfigSchema = z.object({
  model: z.string().min(1),
  rounds: z.coerce.number().int().nonnegative().default(3),
  maxAttempts: z.coerce.number().int().positive().default(3),
  backoffSeconds: z.coerce.number().nonnegative().default(60),
  maxTokens: z.coerce.number().int().positive().default(1024),
  failurePolicy: failurePolicySchema.default("abort"),
  seed: z.coerce.number().int().optional(),
  corpusPath: z.string().min(1),
  apiKey: z.string().min(1).optional(),
});
