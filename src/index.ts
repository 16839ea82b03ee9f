/**
 * Application Entry Point
 *
 * Starts the classification server on the configured local endpoint.
 *
 * Startup:
 * 1. Load and validate the rule table (fatal on failure)
 * 2. Build the Gemini OCR and batch classifier adapters
 * 3. Bind the endpoint (fatal on failure)
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new connections, release the endpoint
 * 2. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import {
  classificationConfig,
  createContentExtractor,
  createGeminiBatchClassifier,
  createGeminiOcr,
  errorMessage,
  loadRuleSet,
} from './classification/index.js';
import { appConfig, describeEndpoint } from './config.js';
import { createApp, createShutdownHandler, startServer } from './server/server.js';

async function main() {
  console.log('[startup] File classifier starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');

  const rules = loadRuleSet(classificationConfig.rulesPath);
  console.log('[startup] Rule table loaded:', {
    source: classificationConfig.rulesPath,
    keywordRules: rules.keywordRules.length,
    hardRuleExtensions: rules.hardRules.size,
  });

  const ocr = createGeminiOcr({
    apiKey: classificationConfig.geminiApiKey,
    model: classificationConfig.ocrModel,
    maxPages: classificationConfig.maxOcrPages,
    enabled: classificationConfig.ocrEnabled,
  });
  const batchClassifier = createGeminiBatchClassifier({
    apiKey: classificationConfig.geminiApiKey,
    model: classificationConfig.escalationModel,
    enabled: classificationConfig.escalationEnabled,
  });
  console.log('[startup] OCR:', ocr.available() ? 'available' : 'unavailable');
  console.log('[startup] Escalation:', batchClassifier.available() ? 'available' : 'unavailable');

  const app = createApp({
    rules,
    ocr,
    batchClassifier,
    extractor: createContentExtractor({ rules, ocr, maxBytes: classificationConfig.maxExtractBytes }),
    maxEscalationChars: classificationConfig.maxEscalationChars,
  });

  const server = await startServer(app, appConfig.endpoint).catch((err: unknown) => {
    throw new Error(
      `Cannot bind ${describeEndpoint(appConfig.endpoint)}: ${errorMessage(err)}. ` +
        'Is another instance running?',
    );
  });

  const shutdown = createShutdownHandler(server);

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
