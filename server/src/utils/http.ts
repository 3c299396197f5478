/**
 * Unwraps the `cause` undici attaches to network failures so callers see
 * "connect ECONNREFUSED 127.0.0.1:80" instead of "fetch failed".
 */
export function describeFetchError(err: unknown): string {
  if (err instanceof Error) {
    const cause: unknown = err.cause;
    if (cause instanceof Error && cause.message) return cause.message;
    return err.message;
  }
  return String(err);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/** First `max` characters of a response body, for error messages. */
export function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
