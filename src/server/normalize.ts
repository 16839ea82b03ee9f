import { ClassificationRequestSchema, NO_PATH_ERROR } from './types.js';
import type { NormalizedRequest } from './types.js';

/**
 * Normalize a request body into a batch of paths.
 *
 * `files` takes precedence; blank entries are dropped. When it yields nothing,
 * a non-blank legacy `path` becomes a one-element batch.
 */
export function normalizeRequest(body: unknown): NormalizedRequest {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }

  const parsed = ClassificationRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: 'Invalid request: files must be an array of strings and path a string' };
  }

  const files = (parsed.data.files ?? []).filter((p) => p.trim().length > 0);
  if (files.length > 0) {
    return { ok: true, paths: files };
  }

  const single = parsed.data.path;
  if (single !== undefined && single.trim().length > 0) {
    return { ok: true, paths: [single] };
  }

  return { ok: false, error: NO_PATH_ERROR };
}
