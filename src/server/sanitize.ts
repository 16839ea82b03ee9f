/**
 * Request Sanitization for Safe Logging
 *
 * Request bodies carry local file paths and may carry extracted content.
 * Before logging, arrays are summarized as '[Array(N)]' and content-bearing
 * fields are replaced with '[REDACTED]'. A depth limit of 10 bounds recursion.
 */

/** Field names whose values must never appear in logs */
export const REDACTED_FIELDS: ReadonlySet<string> = new Set([
  'content',
  'apiKey',
  'password',
  'token',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = REDACTED_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
