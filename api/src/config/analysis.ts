import { z } from 'zod';

import type { CellValue, FixedBand, ZeroWeightPolicy } from '../models/types.js';
import { AGE_BUCKET_BANDS, AGE_GROUP_BANDS, HOUSEHOLD_INCOME_GROUP_BANDS, INCOME_GROUP_BANDS } from './bands.js';

export type BucketRule =
  | { kind: 'fixed'; source: string; target: string; bands: readonly FixedBand[]; clampNegative?: boolean }
  | { kind: 'quantile'; source: string; target: string; quantiles: number };

export type AnalysisConfig = {
  weightColumn: string;
  conditionColumn: string;
  conditionValue: CellValue;
  missingValue: CellValue | undefined;
  zeroWeightPolicy: ZeroWeightPolicy;
  excludeColumns: string[];
  measureColumns: string[];
  bucketRules: BucketRule[];
};

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

// Numeric-looking values become numbers so they compare against numeric fact cells.
const cellValue = z.string().transform((value): CellValue => {
  const trimmed = value.trim();
  return trimmed !== '' && Number.isFinite(Number(trimmed)) ? Number(trimmed) : trimmed;
});

const envSchema = z.object({
  ANALYSIS_WEIGHT_COLUMN: z.string().min(1).default('PERWT'),
  ANALYSIS_CONDITION_COLUMN: z.string().min(1).default('CINETHH'),
  ANALYSIS_CONDITION_VALUE: cellValue.default('1'),
  ANALYSIS_MISSING_VALUE: cellValue.default('9'),
  ANALYSIS_ZERO_WEIGHT_POLICY: z.enum(['zero', 'omit']).default('zero'),
  ANALYSIS_INCOME_QUANTILES: z.coerce.number().int().positive().default(7),
  ANALYSIS_EXCLUDE_COLUMNS: csvList.default('PERNUM,YEAR'),
  ANALYSIS_MEASURE_COLUMNS: csvList.default('PERWT,AGE,HHINCOME,INCTOT')
});

export function loadAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const parsed = envSchema.parse(env);
  return {
    weightColumn: parsed.ANALYSIS_WEIGHT_COLUMN,
    conditionColumn: parsed.ANALYSIS_CONDITION_COLUMN,
    conditionValue: parsed.ANALYSIS_CONDITION_VALUE,
    // An empty sentinel disables missing-value filtering.
    missingValue: parsed.ANALYSIS_MISSING_VALUE === '' ? undefined : parsed.ANALYSIS_MISSING_VALUE,
    zeroWeightPolicy: parsed.ANALYSIS_ZERO_WEIGHT_POLICY,
    excludeColumns: parsed.ANALYSIS_EXCLUDE_COLUMNS,
    measureColumns: parsed.ANALYSIS_MEASURE_COLUMNS,
    bucketRules: [
      { kind: 'fixed', source: 'AGE', target: 'AGE_BUCKET', bands: AGE_BUCKET_BANDS },
      // Group bands cover negatives themselves or leave them Unknown.
      { kind: 'fixed', source: 'AGE', target: 'AGE_GROUP', bands: AGE_GROUP_BANDS, clampNegative: false },
      { kind: 'quantile', source: 'INCTOT', target: 'INCTOT_BUCKET', quantiles: parsed.ANALYSIS_INCOME_QUANTILES },
      { kind: 'fixed', source: 'INCTOT', target: 'INCTOT_GROUP', bands: INCOME_GROUP_BANDS, clampNegative: false },
      {
        kind: 'fixed',
        source: 'HHINCOME',
        target: 'HHINCOME_GROUP',
        bands: HOUSEHOLD_INCOME_GROUP_BANDS,
        clampNegative: false
      }
    ]
  } satisfies AnalysisConfig;
}
