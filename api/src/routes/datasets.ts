import { stringify } from 'csv-stringify/sync';
import express from 'express';
import { z } from 'zod';

import { codeValue } from '../services/codes.js';
import type { CodebookService } from '../services/codebookService.js';
import type { StarSchemaService } from '../services/starSchemaService.js';

const cellValueSchema = z.union([z.number(), z.string()]);

const createDatasetSchema = z.object({
  name: z.string().min(1),
  rows: z.array(z.record(cellValueSchema)).min(1)
});

const buildSchemaSchema = z.object({
  codebookId: z.string().min(1)
});

const analysisSchema = z.object({
  dimensions: z.array(z.string().min(1)).min(1),
  conditionColumn: z.string().min(1).optional(),
  conditionValue: cellValueSchema.optional(),
  missingValue: cellValueSchema.optional(),
  sort: z
    .object({
      by: z.enum(['percentage', 'group']),
      direction: z.enum(['asc', 'desc'])
    })
    .optional()
});

const indicatorsSchema = z.object({
  dimension: z.string().min(1),
  indicators: z
    .array(
      z.object({
        name: z.string().min(1),
        column: z.string().min(1),
        value: cellValueSchema.default(1),
        missingValue: cellValueSchema.optional()
      })
    )
    .min(1)
});

function sendCsv(res: express.Response, filename: string, rows: Array<Record<string, unknown>>): void {
  const csv = stringify(rows, { header: true });
  res.setHeader('Content-Type', 'text/csv');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(csv);
}

export function createDatasetsRouter(
  starSchemaService: StarSchemaService,
  codebookService: CodebookService
): express.Router {
  const router = express.Router();

  router.post('/', (req, res) => {
    const parseResult = createDatasetSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const dataset = starSchemaService.createDataset(parseResult.data);
    res.status(201).json(dataset);
  });

  router.get('/:datasetId', (req, res) => {
    res.json(starSchemaService.getDataset(req.params.datasetId));
  });

  router.post('/:datasetId/schema', async (req, res) => {
    const parseResult = buildSchemaSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const codebook = await codebookService.getCodebook(parseResult.data.codebookId);
    const schema = starSchemaService.buildSchema(req.params.datasetId, codebook);
    res.json({
      columns: schema.fact.columns,
      rowCount: schema.fact.rows.length,
      dimensions: Object.keys(schema.dimensions),
      bucketColumns: schema.bucketColumns,
      diagnostics: schema.diagnostics
    });
  });

  router.post('/:datasetId/verification', async (req, res) => {
    const parseResult = buildSchemaSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const codebook = await codebookService.getCodebook(parseResult.data.codebookId);
    res.json(starSchemaService.verifySchema(req.params.datasetId, codebook));
  });

  router.get('/:datasetId/dimensions/:variable', (req, res) => {
    const table = starSchemaService.getDimension(req.params.datasetId, req.params.variable);
    res.json({
      ...table,
      entries: table.entries.map((entry) => ({ ...entry, code: codeValue(entry.code) })),
      undefinedCodes: table.undefinedCodes.map(codeValue)
    });
  });

  router.get('/:datasetId/dimensions/:variable/export.csv', (req, res) => {
    const { variable } = req.params;
    const table = starSchemaService.getDimension(req.params.datasetId, variable);
    sendCsv(
      res,
      `dim_${variable.toLowerCase()}.csv`,
      table.entries.map((entry) => ({
        [variable]: codeValue(entry.code),
        [`${variable}_value`]: entry.label,
        [`${variable}_desc`]: entry.description
      }))
    );
  });

  router.post('/:datasetId/analyses', (req, res) => {
    const parseResult = analysisSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    res.json(starSchemaService.analyze(req.params.datasetId, parseResult.data));
  });

  router.post('/:datasetId/indicators', (req, res) => {
    const parseResult = indicatorsSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const { dimension, indicators } = parseResult.data;
    res.json(starSchemaService.compareIndicators(req.params.datasetId, dimension, indicators));
  });

  router.get('/:datasetId/analyses/:dimension/export.csv', (req, res) => {
    const { datasetId, dimension } = req.params;
    const [analysis] = starSchemaService.analyze(datasetId, { dimensions: [dimension] });
    sendCsv(
      res,
      `${dimension.toLowerCase()}_weighted_stats.csv`,
      (analysis?.statistics ?? []).map((row) => ({
        dimension_value: row.dimensionValue,
        label: row.label,
        percentage: row.percentage,
        population_estimate: row.populationEstimate,
        sample_size: row.sampleSize
      }))
    );
  });

  return router;
}
