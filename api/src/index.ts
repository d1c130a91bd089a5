import 'dotenv/config';

import { createApp } from './app.js';
import { loadAnalysisConfig } from './config/analysis.js';
import { createNeo4jDriver } from './neo4j.js';
import { CodebookService } from './services/codebookService.js';
import { StarSchemaService } from './services/starSchemaService.js';
import { logger } from './utils/logger.js';

const port = process.env.PORT ?? '4000';

async function bootstrap(): Promise<void> {
  const config = loadAnalysisConfig();
  const driver = await createNeo4jDriver();

  const app = createApp({
    codebookService: new CodebookService(driver),
    starSchemaService: new StarSchemaService(config)
  });

  app.listen(port, () => {
    logger.info({ weightColumn: config.weightColumn, conditionColumn: config.conditionColumn }, `API listening on port ${port}`);
  });
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Failed to bootstrap API');
  process.exit(1);
});
