export {
  type ClassifierProvider,
  isQuotaError,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from "./provider.js";
export { type GeminiProviderOptions, createGeminiProvider } from "./gemini.js";
export {
  type AnthropicProviderOptions,
  createAnthropicClient,
  createAnthropicProvider,
} from "./anthropic.js";
export { type ProviderPair, createProviders } from "./providers.js";
