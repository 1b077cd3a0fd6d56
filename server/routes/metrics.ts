import { Router } from 'express';
import { toPrometheusText } from '../services/prometheus.js';
import type { SimulationSession } from '../services/simulationSession.js';

interface MetricsDeps {
  session: SimulationSession;
  prometheusEnabled: boolean;
}

export function createMetricsRouter(deps: MetricsDeps): Router {
  const router = Router();

  router.get('/prometheus', (_req, res) => {
    if (!deps.prometheusEnabled) {
      res.status(404).json({ error: 'Prometheus scrape endpoint is disabled' });
      return;
    }

    res
      .status(200)
      .set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(toPrometheusText(deps.session.getSummary(), deps.session.getStatus()));
  });

  return router;
}
