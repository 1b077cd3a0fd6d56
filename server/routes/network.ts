import { Router } from 'express';
import type { PathResult } from '../../simulation/engine/PathFinder.js';
import type { SimulationSession } from '../services/simulationSession.js';
import { HttpError, isLatency, isLinkLatencyPayload, isSendMessagePayload } from '../types.js';

interface NetworkDeps {
  session: SimulationSession;
}

function describePath(result: PathResult): { found: boolean; path: string[]; latencyMs: number | null } {
  return result.found
    ? { found: true, path: result.path.map((node) => node.name), latencyMs: result.latencyMs }
    : { found: false, path: [], latencyMs: null };
}

function readQuery(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim() === '') throw new HttpError(400, `Expected query parameter: ${name}`);
  return value.trim();
}

export function createNetworkRouter(deps: NetworkDeps): Router {
  const router = Router();
  const { network } = deps.session;

  function requireNode(name: string): void {
    if (!network.findNodeByName(name)) throw new HttpError(404, `Node '${name}' not found`);
  }

  router.get('/status', (_req, res) => {
    res.status(200).json({ nodes: deps.session.getStatus() });
  });

  router.get('/topology', (_req, res) => {
    res.status(200).json(network.getTopology());
  });

  router.get('/path', (req, res, next) => {
    try {
      const from = readQuery(req.query.from, 'from');
      const to = readQuery(req.query.to, 'to');
      requireNode(from);
      requireNode(to);
      res.status(200).json(describePath(network.findPath(from, to)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/messages', (req, res, next) => {
    try {
      if (!isSendMessagePayload(req.body)) throw new HttpError(400, 'Expected { from, to, payload }');
      const { from, to, payload } = req.body;
      const outcome = network.sendMessage(from, to, payload);
      if (!outcome.ok) throw new HttpError(404, `Node '${outcome.name}' not found`);

      console.log(
        `[network] message ${outcome.message.id} ${from} -> ${to} ${outcome.delivered ? 'delivered' : 'failed'}`,
      );
      res.status(200).json({
        delivered: outcome.delivered,
        messageId: outcome.message.id,
        ...describePath(outcome.route),
      });
    } catch (err) {
      next(err);
    }
  });

  router.put('/nodes/:name/active', (req, res, next) => {
    try {
      const active = req.body?.active;
      if (typeof active !== 'boolean') throw new HttpError(400, 'Expected { active: boolean }');

      const outcome = network.setActive(req.params.name, active);
      if (!outcome.ok) throw new HttpError(404, `Node '${req.params.name}' not found`);

      console.log(`[network] ${outcome.node.name} is now ${active ? 'ONLINE' : 'OFFLINE'}`);
      res.status(200).json({ id: outcome.node.id, name: outcome.node.name, active: outcome.node.isActive });
    } catch (err) {
      next(err);
    }
  });

  router.put('/links', (req, res, next) => {
    try {
      if (!isLinkLatencyPayload(req.body)) throw new HttpError(400, 'Expected { from, to, latencyMs }');
      const { from, to, latencyMs } = req.body;
      if (!isLatency(latencyMs)) throw new HttpError(400, 'latencyMs must be a non-negative integer');

      const outcome = network.setLinkLatency(from, to, latencyMs);
      if (!outcome.ok) {
        if (outcome.reason === 'no_link') throw new HttpError(409, `No direct link between ${from} and ${to}`);
        throw new HttpError(404, `Unknown node in link ${from} <-> ${to}`);
      }

      console.log(`[network] latency ${from} <-> ${to} set to ${latencyMs}ms`);
      res.status(200).json({ from, to, latencyMs });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
