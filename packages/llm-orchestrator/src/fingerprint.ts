/**
 * Request fingerprinting.
 *
 * Fingerprint layout:
 *   {providerId}:{namespace}:{sha256(canonical({payload, params}))}
 *
 * The leading segments let the cache invalidate by provider or by template
 * version with a plain prefix. Canonicalization sorts object keys, drops
 * undefined members and collapses whitespace inside strings, so the same
 * logical request built at two call sites gets the same id.
 */
import { createHash } from "node:crypto";
import { FingerprintError } from "./errors.js";

export type FingerprintId = string;

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

const NO_NAMESPACE = "_";

export function fingerprint(
  providerId: string,
  payload: unknown,
  params: unknown = {},
  namespace?: string
): FingerprintId {
  const provider = checkSegment(providerId, "provider id");
  const ns = namespace === undefined ? NO_NAMESPACE : checkSegment(namespace, "namespace");
  const body = canonicalJson({ payload, params });
  const hash = createHash("sha256").update(body).digest("hex");
  return `${provider}:${ns}:${hash}`;
}

/** Selector matching every fingerprint for a provider, optionally narrowed to a namespace */
export function fingerprintPrefix(providerId: string, namespace?: string): string {
  const provider = checkSegment(providerId, "provider id");
  return namespace === undefined ? `${provider}:` : `${provider}:${checkSegment(namespace, "namespace")}:`;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function canonicalize(value: unknown): CanonicalValue {
  return walk(value, new Set<object>(), "$");
}

// ─── Internals ───────────────────────────────────────────────────────────────

function walk(value: unknown, ancestors: Set<object>, path: string): CanonicalValue {
  if (value === null) return null;

  switch (typeof value) {
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) throw new FingerprintError(`Non-finite number at ${path}`);
      return value;
    case "string":
      return normalizeWhitespace(value);
    case "object":
      break;
    default:
      throw new FingerprintError(`Cannot fingerprint a ${typeof value} at ${path}`);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new FingerprintError(`Invalid date at ${path}`);
    return value.toISOString();
  }

  if (ancestors.has(value)) throw new FingerprintError(`Circular reference at ${path}`);
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => {
        if (item === undefined) throw new FingerprintError(`Undefined array item at ${path}[${i}]`);
        return walk(item, ancestors, `${path}[${i}]`);
      });
    }

    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new FingerprintError(`Only plain objects can be fingerprinted (at ${path})`);
    }

    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const out: { [key: string]: CanonicalValue } = {};
    for (const [key, member] of entries) {
      if (member === undefined) continue;
      out[key] = walk(member, ancestors, `${path}.${key}`);
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}

function normalizeWhitespace(s: string): string {
  return s.trim().replace(/\s+/g, " ");
}

function checkSegment(segment: string, label: string): string {
  const trimmed = segment.trim();
  if (trimmed.length === 0) throw new FingerprintError(`Empty ${label}`);
  if (trimmed.includes(":")) throw new FingerprintError(`The ${label} must not contain ":" (got "${trimmed}")`);
  return trimmed;
}
