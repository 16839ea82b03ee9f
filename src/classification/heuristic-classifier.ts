/**
 * Heuristic Classifier — extension hard rules + ordered keyword scan
 *
 * Phase 1: audio/video/archive extensions resolve unconditionally. These
 * results are final and the escalation stage never overrides them.
 *
 * Phase 2: for non-empty content, the lower-cased text is checked against the
 * rule set's keyword rules in list order. The first rule with any substring
 * hit wins; no hit leaves the file at Misc. Matching is plain substring
 * containment, not word tokenization ("pnr" matches inside any word).
 */

import { errorMessage } from './errors.js';
import { getExtension } from './rules.js';
import { DEFAULT_CATEGORY } from './types.js';
import type { Category, ClassificationResult, FileContent, RuleSet } from './types.js';

/** Category from the extension hard rules, or null when none applies */
export function matchHardRule(filePath: string, rules: RuleSet): Category | null {
  return rules.hardRules.get(getExtension(filePath)) ?? null;
}

export function isHardRule(filePath: string, rules: RuleSet): boolean {
  return matchHardRule(filePath, rules) !== null;
}

/** First keyword rule with a hit in `content`, or null */
export function matchKeywordRule(content: string, rules: RuleSet): Category | null {
  const text = content.toLowerCase();
  for (const rule of rules.keywordRules) {
    if (rule.keywords.some((kw) => kw.length > 0 && text.includes(kw))) {
      return rule.category;
    }
  }
  return null;
}

/**
 * Classify one file. Deterministic and total: anything unmatched is Misc.
 */
export function classifyHeuristic(filePath: string, content: string, rules: RuleSet): Category {
  const hard = matchHardRule(filePath, rules);
  if (hard) return hard;

  if (content.trim().length === 0) return DEFAULT_CATEGORY;

  return matchKeywordRule(content, rules) ?? DEFAULT_CATEGORY;
}

/**
 * Classify a batch. A file whose classification throws resolves to Misc with
 * the error attached; the other files are unaffected.
 */
export function classifyContents(
  contents: FileContent[],
  rules: RuleSet,
  classify: typeof classifyHeuristic = classifyHeuristic,
): ClassificationResult[] {
  return contents.map(({ path, content }) => {
    try {
      return { path, category: classify(path, content, rules) };
    } catch (err) {
      console.error('[heuristic] Classification failed:', { path, error: errorMessage(err) });
      return { path, category: DEFAULT_CATEGORY, error: errorMessage(err) };
    }
  });
}
