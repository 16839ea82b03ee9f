/**
 * Response Assembler
 *
 * Produces the reply envelope with exactly one result per distinct requested
 * path. Entries are ordered by first occurrence in the request; a path that
 * somehow has no result is filled in as Misc with an error note.
 */

import { DEFAULT_CATEGORY } from './types.js';
import type { ClassificationResponse, ClassificationResult } from './types.js';

/** Drop repeated paths, keeping the first occurrence */
export function dedupePaths(paths: readonly string[]): string[] {
  return [...new Set(paths)];
}

export function assembleResponse(
  paths: readonly string[],
  results: ClassificationResult[],
): ClassificationResponse {
  const resultByPath = new Map<string, ClassificationResult>();
  for (const result of results) {
    if (!resultByPath.has(result.path)) {
      resultByPath.set(result.path, result);
    }
  }

  return {
    results: dedupePaths(paths).map(
      (path) =>
        resultByPath.get(path) ?? {
          path,
          category: DEFAULT_CATEGORY,
          error: 'No classification result produced',
        },
    ),
  };
}
