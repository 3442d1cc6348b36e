import { Router } from 'express';
import type { Logger } from '../logger.js';
import { notifyExporters, type Exporter } from '../services/fanout.js';
import type { HealthRecord } from '../services/healthRecord.js';
import { parseHdsPayload, type HdsProtocol, type HdsUpdate } from '../services/hdsPayload.js';
import { HdsRequestSchema } from '../types/health.js';

type HdsRouterDeps = {
  record: HealthRecord;
  exporters: readonly Exporter[];
  protocol: HdsProtocol;
  logger: Logger;
};

export function createHdsRouter({ record, exporters, protocol, logger }: HdsRouterDeps) {
  const router = Router();

  // PUT / {"data": "heartRate:80"}
  router.put('/', (req, res, next) => {
    let update: HdsUpdate;
    try {
      const body = HdsRequestSchema.parse(req.body);
      logger.info({ data: body.data }, 'Received hds req');
      update = parseHdsPayload(body.data, protocol);
    } catch (e) {
      next(e);
      return;
    }

    const { key, value } = update;
    const applied = record.applyUpdate(key, value);
    res.status(200).end();
    if (applied) notifyExporters(exporters, record.snapshot(), key, logger);
  });

  return router;
}
