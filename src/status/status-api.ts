/**
 * status-api.ts — Read-only local HTTP view of a running node.
 *
 * Endpoints:
 *   GET /v1/peers — Peer directory
 *   GET /v1/users — Live presence entries
 *   GET /v1/stats — Datagram counters and registry sizes
 */

import http from 'node:http';
import express from 'express';
import type { Request, Response, Router } from 'express';
import type { ChatNodeStats } from '../node.js';
import type { LocalIdentity } from '../peer/types.js';
import type { PeerRecord, PresenceEntry } from '../registry/peer.js';

/**
 * Minimal view of a node that the status API depends on.
 */
export interface StatusSource {
  readonly identity: Readonly<LocalIdentity>;
  readonly directory: { list(): PeerRecord[] };
  readonly presence: { list(): PresenceEntry[] };
  getStats(): ChatNodeStats;
}

/**
 * Create the status router.
 */
export function createStatusRouter(source: StatusSource): Router {
  const router = express.Router();

  router.get('/v1/peers', (_req: Request, res: Response) => {
    const peers = source.directory.list();
    res.json({ peers, totalPeers: peers.length });
  });

  router.get('/v1/users', (_req: Request, res: Response) => {
    const users = source.presence.list().map(entry => ({
      name: entry.name,
      address: entry.address,
      lastSeen: new Date(entry.lastSeenAt).toISOString(),
      self: entry.name === source.identity.name && entry.address === source.identity.address,
    }));
    res.json({ users });
  });

  router.get('/v1/stats', (_req: Request, res: Response) => {
    res.json({
      identity: { ...source.identity },
      ...source.getStats(),
    });
  });

  return router;
}

/**
 * Build the express app: status routes plus a JSON 404.
 */
export function createStatusApp(source: StatusSource): express.Express {
  const app = express();
  app.use(createStatusRouter(source));
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  return app;
}

/**
 * Serve the status API on loopback.
 */
export async function startStatusServer(
  source: StatusSource,
  port: number,
  host = '127.0.0.1'
): Promise<http.Server> {
  const httpServer = http.createServer(createStatusApp(source));
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });
  return httpServer;
}
