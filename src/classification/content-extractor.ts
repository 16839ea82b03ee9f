/**
 * Content Extractor
 *
 * Turns a file path into best-effort text for the heuristic classifier.
 * Dispatches on the lower-cased extension:
 * - text extensions: read directly as UTF-8, undecodable bytes dropped
 * - OCR extensions (images, PDFs): handed to the OcrProvider when available
 * - anything else: empty text
 *
 * extract() never throws. Missing files yield empty text with no error;
 * read and OCR failures yield empty text with extractionError set.
 */

import { open, stat } from 'node:fs/promises';
import { errorMessage } from './errors.js';
import { getExtensionClass } from './rules.js';
import type { FileContent, OcrProvider, RuleSet } from './types.js';

export interface ContentExtractor {
  extract(filePath: string): Promise<FileContent>;
}

export interface ContentExtractorOptions {
  rules: RuleSet;
  ocr: OcrProvider;
  /** Plain-text reads stop after this many bytes */
  maxBytes: number;
}

const REPLACEMENT_CHAR = /\uFFFD/g;
const ENCODED_REPLACEMENT_CHAR = Buffer.from('\uFFFD', 'utf8');

function decodeSegment(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes).replace(REPLACEMENT_CHAR, '');
}

/**
 * Decode bytes as UTF-8, dropping anything that does not decode.
 *
 * U+FFFD characters actually encoded in the file (EF BF BD) are kept: the
 * bytes are split on that sequence so only replacements the decoder produced
 * for invalid input are removed.
 */
export function decodeUtf8Lossy(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const segments: string[] = [];
  let start = 0;
  let at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  while (at !== -1) {
    segments.push(decodeSegment(buffer.subarray(start, at)));
    start = at + ENCODED_REPLACEMENT_CHAR.length;
    at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  }
  segments.push(decodeSegment(buffer.subarray(start)));
  return segments.join('\uFFFD');
}

async function readTextPrefix(filePath: string, maxBytes: number): Promise<string> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
    return decodeUtf8Lossy(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    // Missing or inaccessible paths are treated as having no content
    return false;
  }
}

export function createContentExtractor(options: ContentExtractorOptions): ContentExtractor {
  const { rules, ocr, maxBytes } = options;

  return {
    async extract(filePath: string): Promise<FileContent> {
      const extClass = getExtensionClass(filePath, rules);
      if (extClass !== 'text' && extClass !== 'ocr') {
        return { path: filePath, content: '' };
      }

      if (!(await isRegularFile(filePath))) {
        return { path: filePath, content: '' };
      }

      try {
        if (extClass === 'text') {
          return { path: filePath, content: await readTextPrefix(filePath, maxBytes) };
        }

        if (!ocr.available()) {
          return { path: filePath, content: '' };
        }
        return { path: filePath, content: await ocr.extractText(filePath) };
      } catch (err) {
        console.warn('[extractor] Extraction failed, continuing with empty content:', {
          path: filePath,
          kind: extClass,
          error: errorMessage(err),
        });
        return { path: filePath, content: '', extractionError: errorMessage(err) };
      }
    },
  };
}
