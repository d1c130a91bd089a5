import type express from 'express';

import type { CodebookService } from '../services/codebookService.js';
import type { StarSchemaService } from '../services/starSchemaService.js';
import { createCodebooksRouter } from './codebooks.js';
import { createDatasetsRouter } from './datasets.js';

export type Services = {
  codebookService: CodebookService;
  starSchemaService: StarSchemaService;
};

export function registerRoutes(app: express.Express, services: Services): void {
  app.get('/api/v1/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1/codebooks', createCodebooksRouter(services.codebookService));
  app.use('/api/v1/datasets', createDatasetsRouter(services.starSchemaService, services.codebookService));
}
