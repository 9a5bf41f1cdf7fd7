/**
 * Express application: CORS, JSON bodies, the jam and song routers, a health
 * check and the error mapping shared by every route.
 */

import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createJamRouter, createSongRouter } from './routes';
import type { RouteDeps } from './routes';
import type { BroadcastHub } from './hub';
import { isJamError } from '../conductor/errors';

export interface AppDeps extends RouteDeps {
  hub: BroadcastHub;
  corsOrigin: string;
}

const startedAt = Date.now();

/**
 * The 4xx status carried by body-parser errors (413 too large, 415 bad
 * charset, ...), or null for anything else.
 */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      ok: true,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
      connections: deps.hub.subscriberCount(),
    });
  });

  app.use('/jams', createJamRouter(deps));
  app.use('/songs', createSongRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'NOT_FOUND', message: 'Route not found' });
  });

  // Express recognises error handlers by arity, so `_next` must stay
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isJamError(err)) {
      res.status(err.status).json({ error: err.code, message: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'INVALID_REQUEST', message: 'Malformed JSON body' });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null && err instanceof Error) {
      const code = status === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_REQUEST';
      res.status(status).json({ error: code, message: err.message });
      return;
    }
    console.error('[API] Unhandled error:', err);
    res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
  });

  return app;
}
