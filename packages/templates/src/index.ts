/**
 * @conduit/templates: prompt templates, registry and typed client
 */
export { Template, defineTemplate, JSON_INSTRUCTION, DEFAULT_TTL_SECONDS, DEFAULT_MAX_RETRIES, DEFAULT_ESTIMATED_COST } from "./template.js";
export type { TemplateDefinition, TemplateInfo, RenderableTemplate } from "./template.js";
export { TemplateRegistry } from "./registry.js";
export { PromptEngine, buildRepairMessage } from "./engine.js";
export { TemplateClient } from "./client.js";
export type { ActionExecutor, ProcessOptions } from "./client.js";
export { cleanJson, extractJsonObject, parseJsonLenient, validateResponse, responseSchema, formatIssues } from "./json.js";
export type { Schema, JsonParse } from "./json.js";
export { productSearch, ProductSearchInput, ProductSearchOutput } from "./builtins/product-search.js";
