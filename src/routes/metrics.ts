import { Router } from 'express';

type MetricsSource = {
  contentType: string;
  render(): Promise<string>;
};

export function createMetricsRouter(source: MetricsSource) {
  const router = Router();

  // GET /metrics, empty body while there is no fresh data
  router.get('/metrics', async (_req, res, next) => {
    try {
      const body = await source.render();
      res.status(200).setHeader('Content-Type', source.contentType);
      res.send(body);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
