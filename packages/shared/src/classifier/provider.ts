import type { ProviderName } from "../types.js";

/**
 * A language-model backend that turns a rendered prompt into free text.
 * Implementations do no retrying of their own; quota handling and failover
 * belong to the batch classifier.
 */
export interface ClassifierProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2000;
export const DEFAULT_TIMEOUT_MS = 60_000;

const STATUS_429 = /\b429\b/;

/**
 * True for quota and rate-limit failures (HTTP 429, RESOURCE_EXHAUSTED, or a
 * message mentioning quota). Both SDKs surface `status` on their API errors;
 * the message checks cover errors rethrown by wrappers. `429` must stand
 * alone so ids and byte counts that contain the digits do not match.
 */
export function isQuotaError(error: unknown): boolean {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    error.status === 429
  ) {
    return true;
  }
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (STATUS_429.test(msg)) return true;
    if (msg.includes("resource_exhausted")) return true;
    if (msg.includes("quota")) return true;
    if (msg.includes("rate limit")) return true;
  }
  return false;
}
