import { Router } from 'express';
import type { SimulationSession } from '../services/simulationSession.js';

interface HealthDeps {
  session: SimulationSession;
  prometheusEnabled: boolean;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const status = deps.session.getStatus();
    res.status(200).json({
      status: 'ok',
      nodes: status.length,
      online: status.filter((node) => node.active).length,
      routingEvents: deps.session.events.size,
      buildIssues: deps.session.buildIssues.length,
      prometheus: deps.prometheusEnabled ? 'enabled' : 'disabled',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
