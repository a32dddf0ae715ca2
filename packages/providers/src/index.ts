/**
 * @conduit/providers: provider adapters for OpenAI-compatible APIs
 */
export { OpenAICompatibleProvider, priceOf } from "./openai-compatible.js";
export type { FetchFn, Pricing, ProviderConfig, ProviderOptions } from "./openai-compatible.js";
export { PRESETS, createProvider, isPresetName } from "./presets.js";
export type { PresetName } from "./presets.js";
export { parseRetryAfter } from "./retry-after.js";
export type { HeaderSource } from "./retry-after.js";
