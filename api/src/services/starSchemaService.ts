import { randomUUID } from 'node:crypto';

import type { AnalysisConfig, BucketRule } from '../config/analysis.js';
import { NotFoundError } from '../models/errors.js';
import type {
  DimensionAnalysis,
  DimensionTable,
  FactRelation,
  IndicatorDefinition,
  IndicatorStatistic,
  PipelineDiagnostic,
  StarSchema,
  StatisticSort
} from '../models/types.js';
import { logger } from '../utils/logger.js';
import { bucketizeFixed, bucketizeQuantiles } from './bucketizer.js';
import type { CodebookIndex } from './codebookIndex.js';
import { codeValue } from './codes.js';
import {
  buildDimensionTable,
  buildUnlabeledDimensionTable,
  type DimensionVerification,
  verifyDimensionTable
} from './dimensionTableBuilder.js';
import { appendColumn, columnValues, createFactRelation, dimensionColumns, hasColumn, projectFact } from './factProjector.js';
import { aggregateIndicators, aggregateWeighted, excludeMissing, mergeLabels, summarizeStatistics } from './weightedAggregator.js';

type Dataset = {
  id: string;
  name: string;
  createdAt: string;
  fact: FactRelation;
  schema?: StarSchema;
};

export type AnalysisRequest = {
  dimensions: string[];
  conditionColumn?: string;
  conditionValue?: number | string;
  missingValue?: number | string;
  sort?: StatisticSort;
};

export type DatasetSummary = {
  id: string;
  name: string;
  createdAt: string;
  rowCount: number;
  columns: string[];
};

function summarize(dataset: Dataset): DatasetSummary {
  return {
    id: dataset.id,
    name: dataset.name,
    createdAt: dataset.createdAt,
    rowCount: dataset.fact.rows.length,
    columns: dataset.fact.columns
  };
}

function bucketDimension(rule: BucketRule, labels: readonly string[]): DimensionTable {
  const codes = Object.fromEntries([...new Set(labels)].map((label) => [label, label]));
  return buildDimensionTable(rule.target, labels, { description: `Buckets derived from ${rule.source}`, codes });
}

function applyBucketRule(
  fact: FactRelation,
  basis: FactRelation,
  rule: BucketRule,
  diagnostics: PipelineDiagnostic[]
): { fact: FactRelation; table: DimensionTable } {
  const values = columnValues(fact, rule.source);
  if (rule.kind === 'fixed') {
    const labels = bucketizeFixed(values, rule.bands, { clampNegative: rule.clampNegative });
    return { fact: appendColumn(fact, rule.target, labels), table: bucketDimension(rule, labels) };
  }
  // Quantile edges come from the rows an analysis will keep.
  const result = bucketizeQuantiles(values, { quantiles: rule.quantiles, basis: columnValues(basis, rule.source) });
  if (result.kind === 'fallback') {
    logger.warn({ variable: rule.source, reason: result.reason }, 'Quantile bucketing fell back to fixed bands');
    diagnostics.push({ kind: 'quantile-fallback', variable: rule.source, reason: result.reason });
  }
  return { fact: appendColumn(fact, rule.target, result.labels), table: bucketDimension(rule, result.labels) };
}

export class StarSchemaService {
  private readonly datasets = new Map<string, Dataset>();

  constructor(private readonly config: AnalysisConfig) {}

  createDataset(payload: { name: string; rows: unknown }): DatasetSummary {
    const dataset: Dataset = {
      id: randomUUID(),
      name: payload.name,
      createdAt: new Date().toISOString(),
      fact: createFactRelation(payload.rows)
    };
    this.datasets.set(dataset.id, dataset);
    logger.info({ datasetId: dataset.id, rows: dataset.fact.rows.length }, 'Dataset created');
    return summarize(dataset);
  }

  getDataset(datasetId: string): DatasetSummary {
    return summarize(this.requireDataset(datasetId));
  }

  buildSchema(datasetId: string, codebook: CodebookIndex): StarSchema {
    const dataset = this.requireDataset(datasetId);
    const { excludeColumns, measureColumns, bucketRules, conditionColumn, missingValue } = this.config;

    const projected = projectFact(dataset.fact, {
      exclude: excludeColumns,
      requiredMeasures: [this.config.weightColumn]
    });

    const diagnostics: PipelineDiagnostic[] = [];
    const dimensionSources = dimensionColumns(projected, { measures: measureColumns, exclude: excludeColumns });

    const dimensions: Record<string, DimensionTable> = {};
    for (const variable of dimensionSources) {
      const values = columnValues(projected, variable);
      const definition = codebook.definitionOf(variable);
      if (!definition) {
        logger.warn({ datasetId, variable }, 'No codebook definition; emitting unlabeled dimension');
        diagnostics.push({ kind: 'missing-definition', variable });
        dimensions[variable] = buildUnlabeledDimensionTable(variable, values);
        continue;
      }
      const table = buildDimensionTable(variable, values, definition);
      if (table.undefinedCodes.length > 0) {
        const codes = table.undefinedCodes.map(codeValue);
        logger.warn({ datasetId, variable, codes }, 'Codes found in data but not in codebook');
        diagnostics.push({ kind: 'undefined-codes', variable, codes });
      }
      dimensions[variable] = table;
    }

    const basis =
      missingValue !== undefined && hasColumn(projected, conditionColumn)
        ? excludeMissing(projected, conditionColumn, missingValue)
        : projected;

    let fact = projected;
    const bucketColumns: string[] = [];
    for (const rule of bucketRules) {
      if (!hasColumn(fact, rule.source)) {
        logger.debug({ datasetId, source: rule.source }, 'Bucket source column absent; skipping');
        continue;
      }
      const bucketed = applyBucketRule(fact, basis, rule, diagnostics);
      fact = bucketed.fact;
      dimensions[rule.target] = bucketed.table;
      bucketColumns.push(rule.target);
    }

    const schema: StarSchema = { fact, dimensions, bucketColumns, diagnostics };
    dataset.schema = schema;
    logger.info(
      { datasetId, dimensions: Object.keys(dimensions).length, diagnostics: diagnostics.length },
      'Star schema built'
    );
    return schema;
  }

  /** Checks every codebook-backed dimension of the built schema against its definition. */
  verifySchema(datasetId: string, codebook: CodebookIndex): DimensionVerification[] {
    const schema = this.getSchema(datasetId);
    const reports: DimensionVerification[] = [];
    for (const [variable, table] of Object.entries(schema.dimensions)) {
      const definition = codebook.definitionOf(variable);
      if (!definition) {
        continue;
      }
      const report = verifyDimensionTable(table, definition);
      if (report.missingCodes.length > 0 || report.labelMismatches.length > 0) {
        logger.warn({ datasetId, variable, report }, 'Dimension table disagrees with codebook');
      }
      reports.push(report);
    }
    return reports;
  }

  getSchema(datasetId: string): StarSchema {
    const schema = this.requireDataset(datasetId).schema;
    if (!schema) {
      throw new NotFoundError('Star schema for dataset', datasetId);
    }
    return schema;
  }

  getDimension(datasetId: string, variable: string): DimensionTable {
    const table = this.getSchema(datasetId).dimensions[variable];
    if (!table) {
      throw new NotFoundError('Dimension', variable);
    }
    return table;
  }

  analyze(datasetId: string, request: AnalysisRequest): DimensionAnalysis[] {
    const schema = this.getSchema(datasetId);
    // Dimensions are independent reads over the same bucketed fact relation.
    return request.dimensions.map((dimension) => {
      const statistics = aggregateWeighted(schema.fact, {
        groupColumn: dimension,
        weightColumn: this.config.weightColumn,
        conditionColumn: request.conditionColumn ?? this.config.conditionColumn,
        conditionValue: request.conditionValue ?? this.config.conditionValue,
        missingValue: request.missingValue ?? this.config.missingValue,
        zeroWeightPolicy: this.config.zeroWeightPolicy,
        sort: request.sort
      });
      const labeled = mergeLabels(statistics, schema.dimensions[dimension]);
      return { dimension, statistics: labeled, summary: summarizeStatistics(labeled) } satisfies DimensionAnalysis;
    });
  }

  compareIndicators(datasetId: string, dimension: string, indicators: IndicatorDefinition[]): IndicatorStatistic[] {
    const schema = this.getSchema(datasetId);
    return aggregateIndicators(schema.fact, {
      groupColumn: dimension,
      weightColumn: this.config.weightColumn,
      indicators,
      zeroWeightPolicy: this.config.zeroWeightPolicy
    });
  }

  private requireDataset(datasetId: string): Dataset {
    const dataset = this.datasets.get(datasetId);
    if (!dataset) {
      throw new NotFoundError('Dataset', datasetId);
    }
    return dataset;
  }
}
