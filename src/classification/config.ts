/**
 * Classification Configuration
 *
 * Centralizes all environment variable access for the classification pipeline.
 * Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - GEMINI_API_KEY: Optional Gemini API key. Without it OCR and escalation are unavailable.
 * - ESCALATION_MODEL: Gemini model for batch classification (default: gemini-2.0-flash)
 * - OCR_MODEL: Gemini model for text recognition (default: gemini-2.0-flash)
 * - OCR_MAX_PAGES: Max PDF pages sent for text recognition (default: 5)
 * - ESCALATION_MAX_CHARS: Max characters of content per escalated file (default: 4000)
 * - EXTRACT_MAX_BYTES: Max bytes read from a plain-text file (default: 1 MiB)
 * - ESCALATION_ENABLED / OCR_ENABLED: Kill switches (default: true)
 * - CLASSIFICATION_RULES_PATH: Alternate rule table (default: config/classification-rules.json)
 *
 * Numeric settings must be positive integers; anything else fails at load.
 */

import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { positiveIntEnv } from '../config.js';

export interface ClassificationConfig {
  /** Gemini API key; empty string when not configured */
  geminiApiKey: string;
  escalationModel: string;
  ocrModel: string;
  /** Multi-page documents are capped to this many leading pages before OCR */
  maxOcrPages: number;
  maxEscalationChars: number;
  maxExtractBytes: number;
  escalationEnabled: boolean;
  ocrEnabled: boolean;
  rulesPath: string;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../config/classification-rules.json', import.meta.url),
);

export const classificationConfig: ClassificationConfig = {
  geminiApiKey: optionalEnv('GEMINI_API_KEY'),
  escalationModel: optionalEnv('ESCALATION_MODEL', 'gemini-2.0-flash'),
  ocrModel: optionalEnv('OCR_MODEL', 'gemini-2.0-flash'),
  maxOcrPages: positiveIntEnv('OCR_MAX_PAGES', 5),
  maxEscalationChars: positiveIntEnv('ESCALATION_MAX_CHARS', 4000),
  maxExtractBytes: positiveIntEnv('EXTRACT_MAX_BYTES', 1024 * 1024),
  escalationEnabled: process.env.ESCALATION_ENABLED !== 'false',
  ocrEnabled: process.env.OCR_ENABLED !== 'false',
  rulesPath: optionalEnv('CLASSIFICATION_RULES_PATH', DEFAULT_RULES_PATH),
};
