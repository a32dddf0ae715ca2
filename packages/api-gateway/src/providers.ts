import type { ProviderAdapter } from "@conduit/llm-orchestrator";
import { createProvider, isPresetName } from "@conduit/providers";
import type { ProviderOptions } from "@conduit/providers";
import type { Config } from "./config/index.js";

/** One adapter per preset whose API key is set, in preset order */
export function providersFromConfig(config: Config, options: ProviderOptions = {}): ProviderAdapter[] {
  const keys: Record<string, string> = {
    openai: config.openaiApiKey,
    perplexity: config.perplexityApiKey,
    groq: config.groqApiKey,
  };
  const providers: ProviderAdapter[] = [];
  for (const [name, apiKey] of Object.entries(keys)) {
    if (apiKey && isPresetName(name)) {
      providers.push(createProvider(name, apiKey, { requestTimeoutMs: config.requestTimeoutMs }, options));
    }
  }
  return providers;
}
