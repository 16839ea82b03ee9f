/**
 * Request types for the classification endpoint.
 *
 * Two request shapes are accepted and normalized into one batch at the
 * boundary:
 * - { files: ["<path>", ...] } — batch
 * - { path: "<path>" } — legacy single-file request
 */

import { z } from 'zod';

export const ClassificationRequestSchema = z
  .object({
    files: z.array(z.string()).optional(),
    path: z.string().optional(),
  })
  .passthrough();

export type ClassificationRequest = z.infer<typeof ClassificationRequestSchema>;

export type NormalizedRequest =
  | { ok: true; paths: string[] }
  | { ok: false; error: string };

export const NO_PATH_ERROR = 'No path provided';
