/**
 * Gemini Client (lazy singleton)
 *
 * Shared by the OCR and escalation adapters. Only constructed once a caller
 * has confirmed an API key is configured.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';

let _genAI: GoogleGenerativeAI | null = null;
let _apiKey = '';

export function getGenAI(apiKey: string): GoogleGenerativeAI {
  if (_genAI && _apiKey === apiKey) return _genAI;
  _genAI = new GoogleGenerativeAI(apiKey);
  _apiKey = apiKey;
  return _genAI;
}
