import express, { type Express } from 'express';
import { createApiRouter, type ApiDependencies } from './api/router.js';

export function createApp(deps: ApiDependencies): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), catalog_plants: deps.catalog.size });
  });

  app.use('/api', createApiRouter(deps));

  return app;
}
