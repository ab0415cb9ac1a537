import type Anthropic from "@anthropic-ai/sdk";
import {
  withSpan,
  logChunkedAttrs,
  countMetric,
  distributionMetric,
} from "@/lib/telemetry";

export interface GenerateRequest {
  model: string;
  systemInstruction: string;
  contents: string;
}

/**
 * The remote generation endpoint. Implementations may throw; the retry
 * wrapper decides which failures are worth another attempt.
 */
export interface Generator {
  generate(request: GenerateRequest): Promise<string>;
}

/** The slice of the Anthropic client the generator calls. */
export interface MessagesClient {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
  };
}

export interface AnthropicGeneratorOptions {
  maxTokens?: number;
  temperature?: number;
}

const DEFAULT_MAX_TOKENS = 1024;

export function createAnthropicGenerator(
  client: MessagesClient,
  options: AnthropicGeneratorOptions = {},
): Generator {
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    generate(request) {
      return withSpan("belief-shift.generate", "belief_shift.llm", async () => {
        logChunkedAttrs("generator.request", {
          model: request.model,
          systemInstruction: request.systemInstruction,
          contents: request.contents,
        });

        const response = await client.messages.create({
          model: request.model,
          max_tokens: maxTokens,
          ...(options.temperature !== undefined && { temperature: options.temperature }),
          system: request.systemInstruction,
          messages: [{ role: "user", content: request.contents }],
        });

        const firstBlock = response.content[0];
        const text = firstBlock?.type === "text" ? firstBlock.text : "";

        countMetric("belief_shift.llm_call", 1, { model: request.model });
        distributionMetric("belief_shift.input_tokens", response.usage.input_tokens, "token");
        distributionMetric("belief_shift.output_tokens", response.usage.output_tokens, "token");

        return text;
      });
    },
  };
}
