/**
 * Batch Classifier — Google Gemini over all uncertain files at once
 *
 * Receives every file the heuristics left at Misc (with content) and asks
 * Gemini for a category per path in a single request. The reply is constrained
 * by a response schema to a JSON array of per-file entries, then validated with
 * Zod one entry at a time. Malformed entries and entries naming a category the
 * model was not offered are dropped; the rest of the batch still applies.
 *
 * available() is false without an API key or when ESCALATION_ENABLED=false.
 * Call failures and unparsable replies surface as EscalationError; the
 * escalation stage turns them into "no overrides".
 *
 * No file content is logged, only counts.
 */

import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';
import { getGenAI } from './gemini-client.js';
import { EscalationError, errorMessage } from './errors.js';
import { CATEGORIES, CategorySchema } from './types.js';
import type { BatchClassifier, Category, EscalationItem, Override } from './types.js';

export interface GeminiBatchClassifierOptions {
  apiKey: string;
  model: string;
  enabled: boolean;
}

/** Categories the model may choose from; extension-only categories are excluded */
export const ESCALATION_CATEGORIES: readonly Category[] = CATEGORIES.filter(
  (c) => c !== 'Audio' && c !== 'Video' && c !== 'Archives',
);

const escalationCategorySet: ReadonlySet<string> = new Set(ESCALATION_CATEGORIES);

// ---------------------------------------------------------------------------
// Gemini Response Schema (matches OverrideEntrySchema plus the filepath key)
// ---------------------------------------------------------------------------

const escalationResponseSchema: ResponseSchema = {
  type: SchemaType.ARRAY,
  items: {
    type: SchemaType.OBJECT,
    properties: {
      filepath: {
        type: SchemaType.STRING,
        description: 'The exact filepath given in the request',
      },
      category: {
        type: SchemaType.STRING,
        format: 'enum',
        enum: [...ESCALATION_CATEGORIES],
        description: 'The chosen category',
      },
      confidence: {
        type: SchemaType.NUMBER,
        description: 'Confidence score between 0.0 and 1.0',
      },
      reason: {
        type: SchemaType.STRING,
        description: 'Short explanation',
      },
    },
    required: ['filepath', 'category', 'confidence'],
  },
};

const OverrideEntrySchema = z.object({
  category: z.string(),
  confidence: z.number().min(0).max(1),
  reason: z.string().default(''),
});

const ListEntryKeySchema = z.object({ filepath: z.string().min(1) });

// Schema-constrained replies are arrays; path-keyed objects are accepted too
const ReplySchema = z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]);

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export function buildEscalationPrompt(items: EscalationItem[]): string {
  const files = JSON.stringify(items.map((item) => ({ filepath: item.path, content: item.content })));

  return `Classify each of the following files into exactly one category.

Categories: ${ESCALATION_CATEGORIES.join(', ')}

Guidance:
- Use the file name, extension and extracted content.
- An image that was clearly captured from a screen is Screenshots.
- Billing, GST, totals or invoice numbers indicate Invoices.
- IRCTC, PNR or journey details indicate TrainTickets.
- Government-issued identity details indicate IDProofs.
- Exam results, grades or marks indicate Marksheets.
- Usernames, passwords or API keys indicate Credentials.
- A CV or professional profile is Resume.
- Meeting notes, ideas or to-do lists are Notes.
- If confidence is low, use Misc.

Respond with a JSON array holding one entry per file, using the exact filepath given:
[{"filepath": "<filepath>", "category": "<category>", "confidence": <0.0-1.0>, "reason": "<short explanation>"}]

Files:
${files}`;
}

// ---------------------------------------------------------------------------
// Response Parsing
// ---------------------------------------------------------------------------

/** Strip a Markdown code fence if the model wrapped its JSON in one */
export function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

/**
 * Parse the model reply into overrides. Throws EscalationError only when the
 * reply is not JSON or neither an array nor an object. Individual entries that
 * fail validation are dropped and counted.
 */
export function parseOverrides(text: string): Override[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch (err) {
    throw new EscalationError(`Batch classifier returned invalid JSON: ${errorMessage(err)}`, err);
  }

  const reply = ReplySchema.safeParse(raw);
  if (!reply.success) {
    throw new EscalationError('Batch classifier returned an unexpected shape', reply.error);
  }

  const entries: Array<[string, unknown]> = [];
  let malformed = 0;
  if (Array.isArray(reply.data)) {
    for (const item of reply.data) {
      const key = ListEntryKeySchema.safeParse(item);
      if (key.success) {
        entries.push([key.data.filepath, item]);
      } else {
        malformed++;
      }
    }
  } else {
    entries.push(...Object.entries(reply.data));
  }

  const overrides: Override[] = [];
  let unknownCategory = 0;
  for (const [path, value] of entries) {
    const entry = OverrideEntrySchema.safeParse(value);
    if (!entry.success) {
      malformed++;
      continue;
    }
    const category = CategorySchema.safeParse(entry.data.category);
    if (!category.success || !escalationCategorySet.has(category.data)) {
      unknownCategory++;
      continue;
    }
    overrides.push({
      path,
      category: category.data,
      confidence: entry.data.confidence,
      reason: entry.data.reason,
    });
  }

  if (malformed > 0 || unknownCategory > 0) {
    console.warn('[escalation] Dropped overrides:', { malformed, unknownCategory });
  }
  return overrides;
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

export function createGeminiBatchClassifier(options: GeminiBatchClassifierOptions): BatchClassifier {
  return {
    available() {
      return options.enabled && options.apiKey.length > 0;
    },

    async classifyBatch(items: EscalationItem[]): Promise<Override[]> {
      const model = getGenAI(options.apiKey).getGenerativeModel({
        model: options.model,
        generationConfig: {
          responseMimeType: 'application/json',
          responseSchema: escalationResponseSchema,
          temperature: 0.2,
        },
      });

      let text: string;
      try {
        const result = await model.generateContent(buildEscalationPrompt(items));
        text = result.response.text();
      } catch (err) {
        throw new EscalationError(`Batch classifier call failed: ${errorMessage(err)}`, err);
      }

      return parseOverrides(text);
    },
  };
}
