/**
 * Query Parameter Parsing Utilities
 *
 * NaN-safe parsing for API route query parameters, so inputs like
 * ?limit=abc fall back to the default instead of reaching the services.
 */

/**
 * Parse a non-negative integer query parameter, clamped to `max`.
 *
 * @example
 * parseQueryInt(c.req.query("limit"), 0, 500)
 * parseQueryInt("abc", 20, 100) // 20
 * parseQueryInt("150", 20, 100) // 100
 * parseQueryInt("-5", 20, 100)  // 20
 */
export function parseQueryInt(
  value: string | undefined,
  defaultValue: number,
  max?: number,
): number {
  if (!value || !/^\d+$/.test(value)) return defaultValue;
  const parsed = parseInt(value, 10);
  if (max !== undefined && parsed > max) return max;
  return parsed;
}
