import type { Config } from "../config.js";
import type { ClassifierProvider } from "./provider.js";
import { createGeminiProvider } from "./gemini.js";
import { createAnthropicProvider } from "./anthropic.js";

/**
 * Primary and secondary backends. A slot is absent when its credential is
 * not configured.
 */
export interface ProviderPair {
  primary?: ClassifierProvider;
  secondary?: ClassifierProvider;
}

export function createProviders(config: Config): ProviderPair {
  return {
    primary: config.GEMINI_API_KEY
      ? createGeminiProvider(config.GEMINI_API_KEY, {
          model: config.GEMINI_MODEL,
        })
      : undefined,
    secondary: config.ANTHROPIC_API_KEY
      ? createAnthropicProvider(config.ANTHROPIC_API_KEY, {
          model: config.ANTHROPIC_MODEL,
        })
      : undefined,
  };
}
