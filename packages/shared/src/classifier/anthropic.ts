import Anthropic from "@anthropic-ai/sdk";
import {
  type ClassifierProvider,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from "./provider.js";

const SYSTEM_PROMPT =
  "You review short forum posts and comments and answer with a JSON array only.";

export interface AnthropicProviderOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export function createAnthropicClient(
  apiKey: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Anthropic {
  // SDK-level retries are off: the batch classifier owns retry and failover.
  return new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}

export function createAnthropicProvider(
  apiKey: string,
  options?: AnthropicProviderOptions,
): ClassifierProvider {
  const client = createAnthropicClient(apiKey, options?.timeoutMs);
  const model = options?.model ?? "claude-3-5-haiku-latest";

  return {
    name: "anthropic",
    model,
    async complete(prompt: string): Promise<string> {
      const response = await client.messages.create({
        model,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      });

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === "text") parts.push(block.text);
      }
      return parts.join("");
    },
  };
}
