/**
 * OCR Provider — Gemini text recognition for images and PDFs
 *
 * Sends the file inline to Gemini with a transcription prompt and returns the
 * plain text. Multi-page PDFs are truncated to the first N pages with pdf-lib
 * before sending, which bounds both latency and token usage.
 *
 * available() is false without an API key or when OCR_ENABLED=false; the
 * extractor then yields empty text for these files.
 */

import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';
import { getGenAI } from './gemini-client.js';
import { getExtension } from './rules.js';
import type { OcrProvider } from './types.js';

export interface GeminiOcrOptions {
  apiKey: string;
  model: string;
  maxPages: number;
  enabled: boolean;
}

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
  '.heif': 'image/heif',
};

const OCR_PROMPT =
  'Transcribe all readable text in this file. Return plain text only, ' +
  'preserving line breaks. Do not describe images or add commentary. ' +
  'If there is no readable text, return an empty response.';

// ---------------------------------------------------------------------------
// PDF Truncation
// ---------------------------------------------------------------------------

/**
 * Truncate a PDF to the first `maxPages` pages.
 * Returns the original buffer if the PDF has fewer pages than the limit.
 */
export async function truncatePdf(pdfBuffer: Buffer, maxPages: number): Promise<Buffer> {
  try {
    const srcDoc = await PDFDocument.load(new Uint8Array(pdfBuffer), {
      ignoreEncryption: true,
    });
    const pageCount = srcDoc.getPageCount();

    if (pageCount <= maxPages) {
      return pdfBuffer;
    }

    const newDoc = await PDFDocument.create();
    const indices = Array.from({ length: maxPages }, (_, i) => i);
    const copiedPages = await newDoc.copyPages(srcDoc, indices);

    for (const page of copiedPages) {
      newDoc.addPage(page);
    }

    return Buffer.from(await newDoc.save());
  } catch (err) {
    // Encrypted or malformed PDFs are sent whole; Gemini may still read them
    console.warn('[ocr] PDF truncation skipped:', {
      error: err instanceof Error ? err.message : String(err),
    });
    return pdfBuffer;
  }
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export function createGeminiOcr(options: GeminiOcrOptions): OcrProvider {
  return {
    available() {
      return options.enabled && options.apiKey.length > 0;
    },

    async extractText(filePath: string): Promise<string> {
      const mimeType = MIME_TYPES[getExtension(filePath)];
      if (!mimeType) return '';

      let data: Buffer = await readFile(filePath);
      if (mimeType === 'application/pdf') {
        data = await truncatePdf(data, options.maxPages);
      }

      const model = getGenAI(options.apiKey).getGenerativeModel({ model: options.model });
      const result = await model.generateContent([
        { inlineData: { mimeType, data: data.toString('base64') } },
        { text: OCR_PROMPT },
      ]);

      return result.response.text();
    },
  };
}
