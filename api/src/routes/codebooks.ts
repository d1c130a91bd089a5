import express from 'express';
import { z } from 'zod';

import { codebookSchema } from '../services/codebookIndex.js';
import type { CodebookService } from '../services/codebookService.js';

const createCodebookSchema = z.object({
  name: z.string().min(1),
  variables: codebookSchema
});

export function createCodebooksRouter(codebookService: CodebookService): express.Router {
  const router = express.Router();

  router.get('/', async (_req, res) => {
    const codebooks = await codebookService.listCodebooks();
    res.json(codebooks);
  });

  router.get('/:id', async (req, res) => {
    const index = await codebookService.getCodebook(req.params.id);
    res.json(Object.fromEntries(index.variables().map((name) => [name, index.definitionOf(name)])));
  });

  router.post('/', (req, res) => {
    const parseResult = createCodebookSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const summary = codebookService.registerCodebook(parseResult.data.name, parseResult.data.variables);
    res.status(201).json(summary);
  });

  return router;
}
