/**
 * Health Check Endpoint Handler
 *
 * Reports server status and which soft collaborators are usable, so an
 * operator can tell when OCR or escalation is running in degraded mode.
 */

import type { Request, Response } from 'express';
import type { BatchClassifier, OcrProvider } from '../classification/index.js';
import type { SerialQueue } from './serial-queue.js';

export interface HealthDeps {
  ocr: OcrProvider;
  batchClassifier: BatchClassifier;
  queue: SerialQueue;
}

export function createHealthHandler(deps: HealthDeps) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? 'dev',
      ocrAvailable: deps.ocr.available(),
      escalationAvailable: deps.batchClassifier.available(),
      pending: deps.queue.pending,
    });
  };
}
