/**
 * Tests for the Gemini Batch Classifier
 *
 * Tests cover:
 * - Availability depends on API key and kill switch
 * - One generateContent call per batch with JSON response config
 * - Prompt lists the allowed categories and every file path
 * - Reply parsing: arrays and path-keyed objects, fenced JSON, missing reason
 * - Malformed entries and disallowed categories are dropped one at a time
 * - Invalid replies and API failures surface as EscalationError
 *
 * The Gemini SDK is mocked; no network access.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Module-level mocks (must be before imports)
// ---------------------------------------------------------------------------

const { mockGenerateContent, mockGetGenerativeModel } = vi.hoisted(() => {
  const mockGenerateContent = vi.fn();
  const mockGetGenerativeModel = vi.fn(() => ({ generateContent: mockGenerateContent }));
  return { mockGenerateContent, mockGetGenerativeModel };
});

vi.mock('@google/generative-ai', () => ({
  SchemaType: {
    ARRAY: 'ARRAY',
    OBJECT: 'OBJECT',
    STRING: 'STRING',
    NUMBER: 'NUMBER',
  },
  GoogleGenerativeAI: class MockGoogleGenAI {
    constructor(_apiKey: string) {}
    getGenerativeModel = mockGetGenerativeModel;
  },
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import {
  ESCALATION_CATEGORIES,
  buildEscalationPrompt,
  createGeminiBatchClassifier,
  parseOverrides,
  stripCodeFence,
} from '../llm-classifier.js';
import { EscalationError } from '../errors.js';

function mockGeminiText(text: string) {
  mockGenerateContent.mockResolvedValue({ response: { text: () => text } });
}

const items = [
  { path: '/docs/cv.txt', content: 'Jane Roe\nSoftware Engineer\n5 years TypeScript' },
  { path: '/docs/ideas.txt', content: 'Ideas for the garden' },
];

describe('Gemini Batch Classifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('available', () => {
    it('is unavailable without an API key', () => {
      const classifier = createGeminiBatchClassifier({ apiKey: '', model: 'gemini-2.0-flash', enabled: true });
      expect(classifier.available()).toBe(false);
    });

    it('is unavailable when disabled', () => {
      const classifier = createGeminiBatchClassifier({
        apiKey: 'test-key',
        model: 'gemini-2.0-flash',
        enabled: false,
      });
      expect(classifier.available()).toBe(false);
    });

    it('is available with a key and enabled', () => {
      const classifier = createGeminiBatchClassifier({
        apiKey: 'test-key',
        model: 'gemini-2.0-flash',
        enabled: true,
      });
      expect(classifier.available()).toBe(true);
    });
  });

  describe('buildEscalationPrompt', () => {
    it('lists categories without extension-only ones', () => {
      const prompt = buildEscalationPrompt(items);

      expect(prompt).toContain('Resume');
      expect(prompt).toContain('Screenshots');
      expect(prompt).not.toContain('Audio');
      expect(prompt).not.toContain('Archives');
    });

    it('embeds every file as JSON', () => {
      const prompt = buildEscalationPrompt(items);

      expect(prompt).toContain('"filepath":"/docs/cv.txt"');
      expect(prompt).toContain('"filepath":"/docs/ideas.txt"');
    });
  });

  describe('parseOverrides', () => {
    it('parses a path-keyed JSON object', () => {
      const text = JSON.stringify({
        '/docs/cv.txt': { category: 'Resume', confidence: 0.92, reason: 'Work history' },
      });

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.92, reason: 'Work history' },
      ]);
    });

    it('accepts JSON wrapped in a code fence', () => {
      const text = '```json\n{"/docs/ideas.txt": {"category": "Notes", "confidence": 0.8, "reason": "ideas"}}\n```';

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/ideas.txt', category: 'Notes', confidence: 0.8, reason: 'ideas' },
      ]);
    });

    it('defaults a missing reason to an empty string', () => {
      const text = '{"/docs/cv.txt": {"category": "Resume", "confidence": 0.7}}';

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.7, reason: '' },
      ]);
    });

    it('drops entries with unknown categories', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const text = JSON.stringify({
        '/docs/cv.txt': { category: 'Resume', confidence: 0.9, reason: 'cv' },
        '/docs/cake.txt': { category: 'Recipes', confidence: 0.9, reason: 'flour' },
      });

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.9, reason: 'cv' },
      ]);
      warnSpy.mockRestore();
    });

    it('throws EscalationError for invalid JSON', () => {
      expect(() => parseOverrides('not json at all')).toThrow(EscalationError);
    });

    it('parses the array form produced under the response schema', () => {
      const text = JSON.stringify([
        { filepath: '/docs/cv.txt', category: 'Resume', confidence: 0.9, reason: 'cv' },
        { filepath: '/docs/ideas.txt', category: 'Notes', confidence: 0.6 },
      ]);

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.9, reason: 'cv' },
        { path: '/docs/ideas.txt', category: 'Notes', confidence: 0.6, reason: '' },
      ]);
    });

    it('returns no overrides for an empty array', () => {
      expect(parseOverrides('[]')).toEqual([]);
    });

    it('keeps valid entries when another entry is malformed', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const text = JSON.stringify({
        '/a.txt': { category: 'Resume', confidence: 0.9 },
        '/b.txt': { category: 'Notes', confidence: '0.8' },
        '/c.txt': { category: 'Notes', confidence: 1.5 },
        '/d.txt': { category: 'Notes' },
      });

      expect(parseOverrides(text)).toEqual([
        { path: '/a.txt', category: 'Resume', confidence: 0.9, reason: '' },
      ]);
      expect(warnSpy).toHaveBeenCalledWith('[escalation] Dropped overrides:', {
        malformed: 3,
        unknownCategory: 0,
      });
      warnSpy.mockRestore();
    });

    it('drops array entries without a filepath', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const text = JSON.stringify([
        { category: 'Resume', confidence: 0.9 },
        { filepath: '/docs/cv.txt', category: 'Resume', confidence: 0.9 },
      ]);

      expect(parseOverrides(text)).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.9, reason: '' },
      ]);
      warnSpy.mockRestore();
    });

    it('drops categories that are decided by extension only', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const text = JSON.stringify({
        '/docs/song-lyrics.txt': { category: 'Audio', confidence: 0.9 },
        '/docs/backup-list.txt': { category: 'Archives', confidence: 0.8 },
      });

      expect(parseOverrides(text)).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith('[escalation] Dropped overrides:', {
        malformed: 0,
        unknownCategory: 2,
      });
      warnSpy.mockRestore();
    });

    it('throws EscalationError for a reply that is neither array nor object', () => {
      expect(() => parseOverrides('"Resume"')).toThrow('Batch classifier returned an unexpected shape');
    });

    it('strips only the fence markers', () => {
      expect(stripCodeFence('```\n{}\n```')).toBe('{}');
      expect(stripCodeFence('  {"a": 1}  ')).toBe('{"a": 1}');
    });
  });

  describe('classifyBatch', () => {
    const classifier = createGeminiBatchClassifier({
      apiKey: 'test-key',
      model: 'gemini-2.0-flash',
      enabled: true,
    });

    it('classifies the batch with a single request', async () => {
      mockGeminiText(
        JSON.stringify({
          '/docs/cv.txt': { category: 'Resume', confidence: 0.95, reason: 'CV layout' },
          '/docs/ideas.txt': { category: 'Notes', confidence: 0.85, reason: 'List of ideas' },
        }),
      );

      const overrides = await classifier.classifyBatch(items);

      expect(mockGenerateContent).toHaveBeenCalledTimes(1);
      expect(overrides).toEqual([
        { path: '/docs/cv.txt', category: 'Resume', confidence: 0.95, reason: 'CV layout' },
        { path: '/docs/ideas.txt', category: 'Notes', confidence: 0.85, reason: 'List of ideas' },
      ]);
    });

    it('requests schema-constrained JSON output from the configured model', async () => {
      mockGeminiText('[]');

      await classifier.classifyBatch(items);

      expect(mockGetGenerativeModel).toHaveBeenCalledWith({
        model: 'gemini-2.0-flash',
        generationConfig: expect.objectContaining({
          responseMimeType: 'application/json',
          temperature: 0.2,
        }),
      });
    });

    it('limits the schema categories to the ones offered in the prompt', async () => {
      mockGeminiText('[]');

      await classifier.classifyBatch(items);

      expect(mockGetGenerativeModel).toHaveBeenCalledWith(
        expect.objectContaining({
          generationConfig: expect.objectContaining({
            responseSchema: expect.objectContaining({
              type: 'ARRAY',
              items: expect.objectContaining({
                required: ['filepath', 'category', 'confidence'],
                properties: expect.objectContaining({
                  category: expect.objectContaining({ enum: [...ESCALATION_CATEGORIES] }),
                }),
              }),
            }),
          }),
        }),
      );
    });

    it('wraps API failures in EscalationError', async () => {
      mockGenerateContent.mockRejectedValue(new Error('quota exceeded'));

      await expect(classifier.classifyBatch(items)).rejects.toThrow(
        'Batch classifier call failed: quota exceeded',
      );
    });
  });
});
