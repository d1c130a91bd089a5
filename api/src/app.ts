import 'express-async-errors';
import cors from 'cors';
import express from 'express';

import { NotFoundError, PipelineError } from './models/errors.js';
import { registerRoutes, type Services } from './routes/index.js';
import { logger } from './utils/logger.js';

export function createApp(services: Services): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '50mb' }));

  registerRoutes(app, services);

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ message: err.message });
      return;
    }
    if (err instanceof PipelineError) {
      logger.error({ err, entity: err.entity }, 'Pipeline stage failed');
      res.status(422).json({ message: err.message, entity: err.entity });
      return;
    }
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
}
