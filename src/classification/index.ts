// ============================================================================
// Classification Module — Barrel Export
// ============================================================================
//
// Public API for the file classification pipeline. The server and CLI import
// from this barrel rather than individual files.
//
// Provides:
// - Types (categories, rule set, pipeline records, collaborator interfaces)
// - Configuration (Gemini key, models, page/char caps, kill switches)
// - Rule set loading and extension lookup
// - Content extractor, heuristic classifier, escalation, assembler
// - Gemini adapters for OCR and batch classification
// - classifyFiles (pipeline orchestrator)

export type {
  Category,
  ExtensionClass,
  RuleSet,
  RuleSetFile,
  KeywordRule,
  FileContent,
  ClassificationResult,
  ClassificationResponse,
  EscalationItem,
  Override,
  OcrProvider,
  BatchClassifier,
} from './types.js';

export { CATEGORIES, DEFAULT_CATEGORY, CategorySchema, RuleSetSchema } from './types.js';

export { classificationConfig } from './config.js';
export type { ClassificationConfig } from './config.js';

export { RuleSetError, EscalationError, errorMessage } from './errors.js';

export { buildRuleSet, loadRuleSet, getExtension, getExtensionClass } from './rules.js';

export { createContentExtractor, decodeUtf8Lossy } from './content-extractor.js';
export type { ContentExtractor, ContentExtractorOptions } from './content-extractor.js';

export {
  classifyHeuristic,
  classifyContents,
  matchHardRule,
  matchKeywordRule,
  isHardRule,
} from './heuristic-classifier.js';

export { collectEscalationItems, escalate, applyOverrides } from './escalation.js';

export { assembleResponse, dedupePaths } from './assembler.js';

export { createGeminiOcr, truncatePdf } from './ocr.js';
export type { GeminiOcrOptions } from './ocr.js';

export { createGeminiBatchClassifier, parseOverrides } from './llm-classifier.js';
export type { GeminiBatchClassifierOptions } from './llm-classifier.js';

export { classifyFiles } from './pipeline.js';
export type { PipelineDeps } from './pipeline.js';
