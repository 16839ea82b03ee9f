/**
 * Classification Type Definitions
 *
 * Types for the file classification pipeline:
 * - CATEGORIES: closed set of categories a file can resolve to
 * - RuleSetSchema: Zod schema for the extension + keyword rule table
 * - FileContent / ClassificationResult: per-file pipeline records
 * - EscalationItem / Override: batch classifier input and output
 * - OcrProvider / BatchClassifier: soft external collaborators
 *
 * Consumers: rules, content-extractor, heuristic-classifier, escalation,
 * pipeline, server
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

/** All categories a file can be classified as. 'Misc' is the uncertain sentinel. */
export const CATEGORIES = [
  'Documents',
  'Images',
  'Audio',
  'Video',
  'Archives',
  'Financials',
  'Screenshots',
  'Invoices',
  'TrainTickets',
  'IDProofs',
  'Marksheets',
  'Credentials',
  'Notes',
  'Resume',
  'Misc',
] as const;

export type Category = typeof CATEGORIES[number];

export const DEFAULT_CATEGORY: Category = 'Misc';

export const CategorySchema = z.enum(CATEGORIES);

// ---------------------------------------------------------------------------
// Rule Set (loaded from config/classification-rules.json)
// ---------------------------------------------------------------------------

const ExtensionSchema = z
  .string()
  .regex(/^\.[a-z0-9]+$/, 'Extensions must be lower-case and start with a dot');

const KeywordSchema = z
  .string()
  .refine((kw) => kw.trim().length > 0, 'Keywords must not be empty');

/** Zod schema for the rule table file */
export const RuleSetSchema = z.object({
  textExtensions: z.array(ExtensionSchema),
  ocrExtensions: z.array(ExtensionSchema),
  hardRules: z.array(
    z.object({
      category: CategorySchema,
      extensions: z.array(ExtensionSchema).min(1),
    }),
  ),
  keywordRules: z.array(
    z.object({
      category: CategorySchema,
      keywords: z.array(KeywordSchema).min(1),
    }),
  ),
});

export type RuleSetFile = z.infer<typeof RuleSetSchema>;

/** Ordered keyword rule; evaluated in list order, first match wins */
export interface KeywordRule {
  readonly category: Category;
  readonly keywords: readonly string[];
}

/** Immutable, lookup-ready form of the rule table */
export interface RuleSet {
  readonly textExtensions: ReadonlySet<string>;
  readonly ocrExtensions: ReadonlySet<string>;
  /** extension -> category for audio/video/archive hard rules */
  readonly hardRules: ReadonlyMap<string, Category>;
  readonly keywordRules: readonly KeywordRule[];
}

/** How the extractor treats a file, derived from its lower-cased extension */
export type ExtensionClass = 'text' | 'ocr' | 'hard_rule' | 'other';

// ---------------------------------------------------------------------------
// Pipeline Records
// ---------------------------------------------------------------------------

export interface FileContent {
  path: string;
  /** Extracted text; empty when nothing could be read */
  content: string;
  extractionError?: string;
}

export interface ClassificationResult {
  path: string;
  category: Category;
  error?: string;
}

/** Uncertain file sent to the batch classifier */
export interface EscalationItem {
  path: string;
  content: string;
}

export interface Override {
  path: string;
  category: Category;
  confidence: number;
  reason: string;
}

export interface ClassificationResponse {
  results: ClassificationResult[];
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Text recognition for images and PDFs. Unavailability (no key, disabled)
 * is a normal degraded mode: callers check available() first.
 */
export interface OcrProvider {
  available(): boolean;
  extractText(filePath: string): Promise<string>;
}

/** Higher-cost classifier for the files heuristics left at Misc */
export interface BatchClassifier {
  available(): boolean;
  classifyBatch(items: EscalationItem[]): Promise<Override[]>;
}
