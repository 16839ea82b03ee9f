/**
 * Shared fixtures for classification tests: the shipped rule table, fake
 * collaborators, and temp-directory helpers.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { loadRuleSet } from '../../rules.js';
import type { BatchClassifier, EscalationItem, OcrProvider, Override, RuleSet } from '../../types.js';

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../../../config/classification-rules.json', import.meta.url),
);

export function loadDefaultRules(): RuleSet {
  return loadRuleSet(DEFAULT_RULES_PATH);
}

export function fakeOcr(available: boolean, text = ''): OcrProvider & {
  extractText: Mock<(filePath: string) => Promise<string>>;
} {
  return {
    available: () => available,
    extractText: vi.fn<(filePath: string) => Promise<string>>().mockResolvedValue(text),
  };
}

export function fakeBatchClassifier(available: boolean, overrides: Override[] = []): BatchClassifier & {
  classifyBatch: Mock<(items: EscalationItem[]) => Promise<Override[]>>;
} {
  return {
    available: () => available,
    classifyBatch: vi.fn<(items: EscalationItem[]) => Promise<Override[]>>().mockResolvedValue(overrides),
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'file-classifier-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeTempFile(dir: string, name: string, data: string | Buffer): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, data);
  return filePath;
}
