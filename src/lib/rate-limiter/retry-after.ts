/**
 * Retry-After hint parsing.
 */

/**
 * Parses a Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @param now - Reference time for HTTP dates (ms since epoch)
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2025 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (
  value: string | null | undefined,
  now: number = Date.now(),
): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();

  // Only accept if the entire string is a valid non-negative integer
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const delayMs = date - now;
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};

/**
 * Reads a Retry-After value from a header bag of unknown shape.
 */
export const getRetryAfterHeader = (headers: unknown): string | null => {
  if (headers instanceof Headers) {
    return headers.get("retry-after");
  }
  if (headers === null || typeof headers !== "object" || Array.isArray(headers)) {
    return null;
  }

  for (const key of ["retry-after", "Retry-After"]) {
    if (key in headers) {
      const value: unknown = Reflect.get(headers, key);
      if (typeof value === "string") {
        return value;
      }
      if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
        return String(value);
      }
    }
  }

  return null;
};
