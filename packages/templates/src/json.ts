/**
 * Structured-response parsing.
 *
 * Models wrap JSON in code fences or chatter around it despite being told
 * not to. Parsing tries, in order:
 *   1. the text with any markdown fence stripped
 *   2. the outermost {...} block inside it
 * and then validates the result against the template's output schema.
 */
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ResponseSchema, SchemaResult } from "@conduit/llm-orchestrator";

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export function cleanJson(raw: string): string {
  return raw
    .replace(/^\s*```(?:json)?\s*/i, "")
    .replace(/\s*```\s*$/i, "")
    .trim();
}

/** The outermost brace-delimited block, or null */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

export type JsonParse = { ok: true; value: unknown; repaired: boolean } | { ok: false; error: string };

export function parseJsonLenient(raw: string): JsonParse {
  const cleaned = cleanJson(raw);
  const direct = tryParse(cleaned);
  if (direct.ok) return { ok: true, value: direct.value, repaired: cleaned !== raw.trim() };

  const block = extractJsonObject(cleaned);
  if (block !== null && block !== cleaned) {
    const extracted = tryParse(block);
    if (extracted.ok) return { ok: true, value: extracted.value, repaired: true };
  }
  return { ok: false, error: direct.error };
}

export function validateResponse<T>(raw: string, schema: Schema<T>): SchemaResult<T> {
  const parsed = parseJsonLenient(raw);
  if (!parsed.ok) return { ok: false, issues: [`Response is not valid JSON: ${parsed.error}`] };

  const result = schema.safeParse(parsed.value);
  if (!result.success) return { ok: false, issues: formatIssues(result.error) };
  return { ok: true, data: result.data, repaired: parsed.repaired };
}

export function responseSchema<T>(schema: Schema<T>): ResponseSchema<T> {
  return { validate: (raw) => validateResponse(raw, schema) };
}

/** "path.to.field: message" per issue; "(root)" for the top level */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
