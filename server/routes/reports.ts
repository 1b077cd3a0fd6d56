import { Router } from 'express';
import { toCsv, writeReport } from '../../simulation/engine/ReportWriter.js';
import type { SimulationSession } from '../services/simulationSession.js';

interface ReportsDeps {
  session: SimulationSession;
  reportPath: string;
}

export function createReportsRouter(deps: ReportsDeps): Router {
  const router = Router();

  router.get('/routing.csv', (_req, res) => {
    res
      .status(200)
      .set('Content-Type', 'text/csv; charset=utf-8')
      .send(toCsv(deps.session.events.getRecords()));
  });

  router.get('/summary', (_req, res) => {
    res.status(200).json(deps.session.getSummary());
  });

  router.post('/', async (_req, res, next) => {
    try {
      const written = await writeReport(deps.session.events.getRecords(), deps.reportPath);
      if (!written) {
        console.log('[reports] no events to report');
        res.status(204).end();
        return;
      }
      console.log(`[reports] wrote ${deps.session.events.size} records to ${deps.reportPath}`);
      res.status(201).json({ ok: true, path: deps.reportPath, records: deps.session.events.size });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
