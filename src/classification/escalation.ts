/**
 * Escalation Batcher
 *
 * Collects files still at Misc that have content, sends them to the batch
 * classifier in one call, and merges the returned overrides back by path.
 *
 * Overrides only ever replace Misc. Hard-rule results, keyword results and
 * paths absent from the batch are left untouched.
 */

import { errorMessage } from './errors.js';
import { isHardRule } from './heuristic-classifier.js';
import { DEFAULT_CATEGORY } from './types.js';
import type {
  BatchClassifier,
  ClassificationResult,
  EscalationItem,
  FileContent,
  Override,
  RuleSet,
} from './types.js';

/**
 * Uncertain files worth escalating: category Misc and non-blank content.
 * Content is truncated to `maxChars` to bound the prompt size.
 */
export function collectEscalationItems(
  results: ClassificationResult[],
  contents: FileContent[],
  maxChars: number,
): EscalationItem[] {
  const contentByPath = new Map(contents.map((c) => [c.path, c.content]));
  const items: EscalationItem[] = [];

  for (const result of results) {
    if (result.category !== DEFAULT_CATEGORY) continue;
    const content = contentByPath.get(result.path) ?? '';
    if (content.trim().length === 0) continue;
    items.push({ path: result.path, content: content.slice(0, maxChars) });
  }

  return items;
}

/**
 * Ask the batch classifier about `items`. At most one call per invocation,
 * none when there is nothing to escalate or the classifier is unavailable.
 * Never throws: failures yield no overrides.
 */
export async function escalate(
  items: EscalationItem[],
  classifier: BatchClassifier,
): Promise<Override[]> {
  if (items.length === 0) return [];

  if (!classifier.available()) {
    console.log('[escalation] Batch classifier unavailable, keeping Misc:', { files: items.length });
    return [];
  }

  try {
    const overrides = await classifier.classifyBatch(items);
    console.log('[escalation] Batch classified:', {
      files: items.length,
      overrides: overrides.length,
    });
    return overrides;
  } catch (err) {
    console.error('[escalation] Batch classifier failed, keeping Misc:', {
      files: items.length,
      error: errorMessage(err),
    });
    return [];
  }
}

/**
 * Apply overrides to a copy of `results`. Returns the merged results; the
 * input array is not modified. Overrides never add entries.
 */
export function applyOverrides(
  results: ClassificationResult[],
  overrides: Override[],
  rules: RuleSet,
): ClassificationResult[] {
  const overrideByPath = new Map<string, Override>();
  for (const override of overrides) {
    if (!overrideByPath.has(override.path)) {
      overrideByPath.set(override.path, override);
    }
  }

  return results.map((result) => {
    const override = overrideByPath.get(result.path);
    if (!override) return result;
    if (result.category !== DEFAULT_CATEGORY) return result;
    if (isHardRule(result.path, rules)) return result;
    return { ...result, category: override.category };
  });
}
