import { Router } from 'express';
import type { HealthData } from '../types/health.js';

export function createLatestRouter(getLatest: () => HealthData | null) {
  const router = Router();

  // GET /
  router.get('/', (_req, res) => {
    const latest = getLatest();
    if (!latest) {
      res.status(404).end();
      return;
    }
    res.json(latest);
  });

  // GET /ws without an Upgrade header
  router.get('/ws', (_req, res) => {
    res.status(426).type('text/plain').send('Upgrade Required');
  });

  return router;
}
