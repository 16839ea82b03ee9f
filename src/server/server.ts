/**
 * Express Classification Server
 *
 * Request/reply layer bound to a local endpoint. Routes:
 * - POST /classify — Classify a batch of paths ({ files } or legacy { path })
 * - GET /health — Server status and collaborator availability
 *
 * Every request gets exactly one JSON reply:
 * - { results: [...] } on success
 * - { error: "..." } for malformed or empty input (400) and internal faults (500)
 *
 * Classifications run through a serial queue: one in flight at a time.
 * A failing request never takes the server down.
 */

import { lstat, rm } from 'node:fs/promises';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { connect } from 'node:net';
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { classifyFiles, errorMessage } from '../classification/index.js';
import type { OcrProvider, PipelineDeps } from '../classification/index.js';
import { describeEndpoint } from '../config.js';
import type { Endpoint } from '../config.js';
import { createHealthHandler } from './health.js';
import { normalizeRequest } from './normalize.js';
import { sanitizeForLog } from './sanitize.js';
import { createSerialQueue } from './serial-queue.js';
import type { SerialQueue } from './serial-queue.js';

export interface ServerDeps extends PipelineDeps {
  ocr: OcrProvider;
  queue?: SerialQueue;
}

function statusOf(err: unknown): number {
  if (err !== null && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory so tests can create fresh app instances with their
 * own rule sets and collaborators.
 */
export function createApp(deps: ServerDeps) {
  const queue = deps.queue ?? createSerialQueue();
  const app = express();

  // Callers are not required to set Content-Type
  app.use(express.json({ type: () => true, limit: '5mb' }));

  app.get('/health', createHealthHandler({ ...deps, queue }));

  app.post('/classify', async (req: Request, res: Response, next: NextFunction) => {
    const normalized = normalizeRequest(req.body);
    if (!normalized.ok) {
      console.warn('[server] Rejected request:', {
        error: normalized.error,
        body: sanitizeForLog(req.body),
      });
      res.status(400).json({ error: normalized.error });
      return;
    }

    try {
      const response = await queue.run(() => classifyFiles(normalized.paths, deps));
      console.log('[server] Classified batch:', { files: response.results.length });
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  // Global error handler: unparsable bodies (400) and internal faults (500)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    console.error('[server] Request failed:', { status, error: errorMessage(err) });
    if (res.headersSent) return;
    res.status(status).json({
      error: status === 400 ? `Malformed request: ${errorMessage(err)}` : errorMessage(err),
    });
  });

  return app;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function listen(server: Server, endpoint: Endpoint): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(err);
    };
    server.once('error', onError);

    const onListening = () => {
      server.off('error', onError);
      resolve();
    };

    if (endpoint.kind === 'socket') {
      server.listen(endpoint.path, onListening);
    } else {
      server.listen(endpoint.port, endpoint.host, onListening);
    }
  });
}

/**
 * True when `socketPath` is a socket file nobody is listening on, as left
 * behind by a process that was killed before it could close its server.
 */
export async function isStaleSocket(socketPath: string): Promise<boolean> {
  try {
    if (!(await lstat(socketPath)).isSocket()) return false;
  } catch {
    return false;
  }

  return new Promise((resolve) => {
    const socket = connect(socketPath);
    socket.once('connect', () => {
      socket.destroy();
      resolve(false);
    });
    socket.once('error', (err) => {
      socket.destroy();
      resolve(errorCode(err) === 'ECONNREFUSED');
    });
  });
}

/**
 * Bind the app to the endpoint. Rejects if the endpoint cannot be bound,
 * which callers treat as a fatal startup error.
 *
 * A socket file left by a crashed instance is removed and the bind retried
 * once. A socket with a live listener, or a path that is not a socket, stays
 * an EADDRINUSE rejection.
 */
export async function startServer(app: ReturnType<typeof createApp>, endpoint: Endpoint): Promise<Server> {
  const server = createServer(app);

  try {
    await listen(server, endpoint);
  } catch (err) {
    if (
      endpoint.kind !== 'socket' ||
      errorCode(err) !== 'EADDRINUSE' ||
      !(await isStaleSocket(endpoint.path))
    ) {
      throw err;
    }
    console.warn('[server] Removing stale socket file:', { path: endpoint.path });
    await rm(endpoint.path, { force: true });
    await listen(server, endpoint);
  }

  server.on('error', (err) => {
    console.error('[server] Server error:', { error: err.message });
  });
  console.log(`[server] Listening on ${describeEndpoint(endpoint)}`);
  return server;
}

/** Close the server and release the endpoint (the socket file is removed) */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Signal handler for SIGTERM/SIGINT. Closes the server, then exits 0, or 1 if
 * the close fails. Repeated signals while shutting down are ignored.
 */
export function createShutdownHandler(
  server: Server,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] Received ${signal}, shutting down...`);

    try {
      await stopServer(server);
      console.log('[shutdown] Endpoint released');
      exit(0);
    } catch (err) {
      console.error('[shutdown] Failed to close server:', errorMessage(err));
      exit(1);
    }
  };
}
