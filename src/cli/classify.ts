#!/usr/bin/env node
/**
 * Classification Client
 *
 * Sends file paths to a running classifier and prints the JSON reply.
 * Useful for manual checks against a live server.
 *
 * Usage:
 *   npx tsx src/cli/classify.ts <path> [path...]
 *   npx tsx src/cli/classify.ts --legacy <path>   (sends { path } instead of { files })
 */

import { realpathSync } from 'node:fs';
import { request } from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { appConfig, describeEndpoint } from '../config.js';
import type { Endpoint } from '../config.js';

export interface ClientArgs {
  legacy: boolean;
  paths: string[];
}

export function parseArgs(argv: string[]): ClientArgs {
  const legacy = argv.includes('--legacy');
  const paths = argv.filter((arg) => arg !== '--legacy').map((p) => path.resolve(p));
  return { legacy, paths };
}

export function buildRequestBody(args: ClientArgs): Record<string, unknown> {
  if (args.legacy) {
    return { path: args.paths[0] ?? '' };
  }
  return { files: args.paths };
}

/** POST a JSON body to /classify on the endpoint and resolve the parsed reply */
export function sendClassificationRequest(endpoint: Endpoint, body: unknown): Promise<unknown> {
  const payload = JSON.stringify(body);
  const target =
    endpoint.kind === 'socket'
      ? { socketPath: endpoint.path }
      : { host: endpoint.host, port: endpoint.port };

  return new Promise((resolve, reject) => {
    const req = request(
      {
        ...target,
        method: 'POST',
        path: '/classify',
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(payload),
        },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          try {
            resolve(JSON.parse(Buffer.concat(chunks).toString('utf8')));
          } catch (err) {
            reject(err);
          }
        });
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    req.end(payload);
  });
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.paths.length === 0) {
    console.error('Usage: file-classifier-client [--legacy] <path> [path...]');
    process.exit(2);
  }

  console.log(`[client] Sending ${args.paths.length} path(s) to ${describeEndpoint(appConfig.endpoint)}`);
  const reply = await sendClassificationRequest(appConfig.endpoint, buildRequestBody(args));
  console.log(JSON.stringify(reply, null, 2));
}

// Only run when executed directly, not when imported by tests
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    console.error('[client] Request failed:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
