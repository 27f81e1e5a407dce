/**
 * rest-api.ts: Express router exposing a node's view of the mesh.
 *
 * Endpoints:
 *   GET  /v1/health         Liveness and peer count
 *   GET  /v1/topology       Full topology snapshot
 *   GET  /v1/peers/:nodeId  One discovered peer plus its last heartbeat
 *   POST /v1/discover       Run a discovery cycle now
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { rateLimit } from 'express-rate-limit';
import type { NetworkTopology } from '../transport.js';
import { PROTOCOL_VERSION } from '../version.js';

/**
 * The part of the transport the monitor reads from.
 */
export interface TopologySource {
  isConnected(): boolean;
  networkTopology(): NetworkTopology;
  discoverNodesNow(): Promise<string[]>;
}

export interface MonitorRouterOptions {
  /** Max POST /v1/discover calls per minute */
  discoverLimit?: number;
}

/**
 * Create the monitor router. Mount it on any express app.
 */
export function createMonitorRouter(source: TopologySource, options: MonitorRouterOptions = {}): Router {
  const router = Router();

  const discoverRateLimit = rateLimit({
    windowMs: 60_000,
    limit: options.discoverLimit ?? 6,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: 'Too many discovery requests, try again later' },
  });

  router.get('/v1/health', (_req: Request, res: Response) => {
    const topology = source.networkTopology();
    res.json({
      connected: source.isConnected(),
      localNode: topology.localNode,
      peers: Object.keys(topology.discoveredNodes).length,
      protocolVersion: PROTOCOL_VERSION,
    });
  });

  router.get('/v1/topology', (_req: Request, res: Response) => {
    res.json(source.networkTopology());
  });

  router.get('/v1/peers/:nodeId', (req: Request, res: Response) => {
    const { nodeId } = req.params;
    const topology = source.networkTopology();
    const peer = topology.discoveredNodes[nodeId];
    const heartbeat = topology.nodeRegistry[nodeId];
    if (!peer && !heartbeat) {
      res.status(404).json({ error: `Unknown node: ${nodeId}` });
      return;
    }
    res.json({ nodeId, peer: peer ?? null, heartbeat: heartbeat ?? null });
  });

  router.post('/v1/discover', discoverRateLimit, async (_req: Request, res: Response) => {
    const discovered = await source.discoverNodesNow();
    res.json({ discovered });
  });

  return router;
}
