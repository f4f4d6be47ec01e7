import express from 'express';
import type { Express } from 'express';
import type { Logger, Registry } from '@depman/core';

import { registryErrorHandler } from '../middleware/registryErrors.js';
import { responseEnvelope } from '../middleware/responseEnvelope.js';
import { servicesMiddleware } from '../middleware/services.js';

export type ExpressAppOptions = {
  basePath?: string;
  registry: Registry;
  logger?: Logger;
  routes?: (app: Express) => void;
};

export function createExpressApp(opts: ExpressAppOptions): Express {
  const app = express();
  const basePath = opts.basePath ?? '';

  app.use(express.json({ limit: '2mb' }));
  app.use(responseEnvelope);
  app.use(servicesMiddleware(opts.registry));

  app.get(`${basePath}/health`, (_req, res) =>
    res.ok({ ok: true, registry: opts.registry.name, contracts: opts.registry.contracts() }),
  );
  opts.routes?.(app);

  app.use(registryErrorHandler(opts.logger));
  return app;
}
