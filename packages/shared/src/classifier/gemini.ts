import { GoogleGenAI } from "@google/genai";
import {
  type ClassifierProvider,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from "./provider.js";

export interface GeminiProviderOptions {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
}

export function createGeminiProvider(
  apiKey: string,
  options?: GeminiProviderOptions,
): ClassifierProvider {
  const ai = new GoogleGenAI({
    apiKey,
    httpOptions: { timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS },
  });
  const model = options?.model ?? "gemini-2.0-flash-lite";

  return {
    name: "gemini",
    model,
    async complete(prompt: string): Promise<string> {
      const response = await ai.models.generateContent({
        model,
        contents: prompt,
        config: {
          temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
          maxOutputTokens: options?.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        },
      });
      return response.text ?? "";
    },
  };
}
