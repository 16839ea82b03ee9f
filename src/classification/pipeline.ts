/**
 * Classification Pipeline
 *
 * Drives one batch of paths end to end:
 * 1. Deduplicate paths (first occurrence wins)
 * 2. Extract content for every file, sequentially
 * 3. Heuristic classification (hard rules, then keyword rules)
 * 4. Escalate remaining Misc-with-content files in a single batch call
 * 5. Merge overrides and assemble one result per path
 *
 * Each stage isolates per-file failures; a batch always yields a full
 * response. Nothing is retained between calls.
 */

import { assembleResponse, dedupePaths } from './assembler.js';
import type { ContentExtractor } from './content-extractor.js';
import { errorMessage } from './errors.js';
import { applyOverrides, collectEscalationItems, escalate } from './escalation.js';
import { classifyContents } from './heuristic-classifier.js';
import type {
  BatchClassifier,
  ClassificationResponse,
  ClassificationResult,
  FileContent,
  RuleSet,
} from './types.js';

export interface PipelineDeps {
  rules: RuleSet;
  extractor: ContentExtractor;
  batchClassifier: BatchClassifier;
  /** Per-file content cap for escalation prompts */
  maxEscalationChars: number;
}

async function extractAll(paths: string[], extractor: ContentExtractor): Promise<FileContent[]> {
  const contents: FileContent[] = [];
  for (const path of paths) {
    try {
      contents.push(await extractor.extract(path));
    } catch (err) {
      contents.push({ path, content: '', extractionError: errorMessage(err) });
    }
  }
  return contents;
}

function annotateExtractionErrors(
  results: ClassificationResult[],
  contents: FileContent[],
): ClassificationResult[] {
  const errorByPath = new Map<string, string>();
  for (const c of contents) {
    if (c.extractionError) errorByPath.set(c.path, c.extractionError);
  }

  return results.map((result) => {
    const extractionError = errorByPath.get(result.path);
    if (!extractionError || result.error) return result;
    return { ...result, error: `Content extraction failed: ${extractionError}` };
  });
}

export async function classifyFiles(
  paths: readonly string[],
  deps: PipelineDeps,
): Promise<ClassificationResponse> {
  const uniquePaths = dedupePaths(paths);

  const contents = await extractAll(uniquePaths, deps.extractor);
  const heuristic = annotateExtractionErrors(classifyContents(contents, deps.rules), contents);

  const items = collectEscalationItems(heuristic, contents, deps.maxEscalationChars);
  const overrides = await escalate(items, deps.batchClassifier);
  const merged = applyOverrides(heuristic, overrides, deps.rules);

  return assembleResponse(uniquePaths, merged);
}
