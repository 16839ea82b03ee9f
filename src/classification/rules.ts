/**
 * Rule Set Loader
 *
 * Reads the extension and keyword rule table once at startup, validates it
 * with Zod, and freezes it into lookup structures that are injected into the
 * extractor and heuristic classifier. Tests build alternate rule sets with
 * buildRuleSet() directly.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { RuleSetError, errorMessage } from './errors.js';
import { RuleSetSchema } from './types.js';
import type { Category, ExtensionClass, RuleSet, RuleSetFile } from './types.js';

/**
 * Convert a validated rule file into an immutable RuleSet.
 *
 * An extension listed under more than one hard rule is a configuration error,
 * since precedence between hard rules is not defined.
 */
export function buildRuleSet(file: RuleSetFile, source = 'inline'): RuleSet {
  const hardRules = new Map<string, Category>();
  for (const rule of file.hardRules) {
    for (const ext of rule.extensions) {
      const existing = hardRules.get(ext);
      if (existing && existing !== rule.category) {
        throw new RuleSetError(
          `Extension ${ext} is mapped to both ${existing} and ${rule.category}`,
          source,
        );
      }
      hardRules.set(ext, rule.category);
    }
  }

  return Object.freeze({
    textExtensions: new Set(file.textExtensions),
    ocrExtensions: new Set(file.ocrExtensions),
    hardRules,
    keywordRules: Object.freeze(
      file.keywordRules.map((rule) =>
        Object.freeze({
          category: rule.category,
          keywords: Object.freeze(rule.keywords.map((kw) => kw.toLowerCase())),
        }),
      ),
    ),
  });
}

/** Read, validate and build the rule set at `rulesPath`. Throws RuleSetError. */
export function loadRuleSet(rulesPath: string): RuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(rulesPath, 'utf8'));
  } catch (err) {
    throw new RuleSetError(`Cannot read rule table: ${errorMessage(err)}`, rulesPath);
  }

  const parsed = RuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new RuleSetError(`Invalid rule table: ${issues}`, rulesPath);
  }

  return buildRuleSet(parsed.data, rulesPath);
}

/** Lower-cased extension including the dot ('' when there is none) */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function getExtensionClass(filePath: string, rules: RuleSet): ExtensionClass {
  const ext = getExtension(filePath);
  if (!ext) return 'other';
  if (rules.hardRules.has(ext)) return 'hard_rule';
  if (rules.textExtensions.has(ext)) return 'text';
  if (rules.ocrExtensions.has(ext)) return 'ocr';
  return 'other';
}
