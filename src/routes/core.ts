import { Router } from 'express';
import { getHealth, getRootMessage } from '../services/demoService';
import { DiagnosticOptions, runDiagnostics } from '../services/diagnostics';

export const createCoreRouter = (apiVersion: string, diagnostics: DiagnosticOptions) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(getRootMessage());
  });

  router.get('/api/health', (_req, res) => {
    res.json(getHealth(apiVersion));
  });

  router.get('/test', (_req, res, next) => {
    runDiagnostics(diagnostics)
      .then((report) => res.json(report))
      .catch(next);
  });

  return router;
};
