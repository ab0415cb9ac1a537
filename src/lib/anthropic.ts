import Anthropic from "@anthropic-ai/sdk";

export const DEFAULT_MODEL = "claude-haiku-4-5-20251001";

/**
 * Builds a client for one experiment run. When no key is given the SDK falls
 * back to ANTHROPIC_API_KEY. SDK retries are off: callWithRetry owns the
 * retry policy.
 */
export function createAnthropicClient(apiKey?: string): Anthropic {
  return apiKey ? new Anthropic({ apiKey, maxRetries: 0 }) : new Anthropic({ maxRetries: 0 });
}
