import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { getEnvValue } from "@crawlerverse/sdk";
import type { LanguageModel } from "ai";

export type ProviderName = "anthropic" | "openai" | "local";

export const PROVIDERS: readonly ProviderName[] = ["anthropic", "openai", "local"];

export const DEFAULT_MODELS: Readonly<Record<ProviderName, string>> = {
  anthropic: "claude-haiku-4-5-20251001",
  openai: "gpt-4o-mini",
  local: "gpt-oss:20b",
};

export const DEFAULT_LOCAL_BASE_URL = "http://localhost:1234/v1";

export type ModelSelection = {
  provider: ProviderName;
  model?: string;
  /** OpenAI-compatible endpoint for `local` (Ollama, LM Studio, ...). */
  baseUrl?: string;
  apiKey?: string;
};

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((name) => name === value);
}

/** Leaderboard id reported to the game service, e.g. "anthropic/claude-haiku-4-5-20251001". */
export function defaultModelId(selection: ModelSelection): string {
  return `${selection.provider}/${selection.model ?? DEFAULT_MODELS[selection.provider]}`;
}

/** Only Anthropic accepts a trailing assistant message as a prefill. */
export function supportsPrefill(provider: ProviderName): boolean {
  return provider === "anthropic";
}

export function resolveModel(selection: ModelSelection): LanguageModel {
  const modelName = selection.model ?? DEFAULT_MODELS[selection.provider];

  switch (selection.provider) {
    case "anthropic":
      return createAnthropic({
        apiKey: selection.apiKey || getEnvValue("ANTHROPIC_API_KEY"),
      })(modelName);
    case "openai":
      return createOpenAI({
        apiKey: selection.apiKey || getEnvValue("OPENAI_API_KEY"),
        baseURL: selection.baseUrl,
      }).chat(modelName);
    case "local":
      return createOpenAI({
        apiKey: selection.apiKey || getEnvValue("OPENAI_API_KEY") || "not-needed",
        baseURL: selection.baseUrl || getEnvValue("OPENAI_BASE_URL") || DEFAULT_LOCAL_BASE_URL,
      }).chat(modelName);
  }
}
