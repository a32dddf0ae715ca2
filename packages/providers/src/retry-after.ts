/**
 * Provider retry hints.
 *
 * `retry-after-ms` wins over `retry-after`; the latter is either delta
 * seconds or an HTTP date. Anything unparseable yields undefined and the
 * retry orchestrator falls back to its own backoff.
 */
export interface HeaderSource {
  get(name: string): string | null;
}

export function parseRetryAfter(headers: HeaderSource, now: number = Date.now()): number | undefined {
  const ms = headers.get("retry-after-ms");
  if (ms !== null) {
    const value = Number(ms.trim());
    if (ms.trim() !== "" && Number.isFinite(value) && value >= 0) return Math.ceil(value);
  }

  const header = headers.get("retry-after")?.trim();
  if (!header) return undefined;

  if (/^\d+(\.\d+)?$/.test(header)) return Math.ceil(Number(header) * 1000);

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
