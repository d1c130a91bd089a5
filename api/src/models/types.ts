export type CellValue = number | string;

export type FactRow = Record<string, CellValue>;

export type FactRelation = {
  columns: string[];
  rows: FactRow[];
};

export type Code = { kind: 'numeric'; value: number } | { kind: 'symbolic'; value: string };

export type VariableDefinition = {
  description: string;
  codes: Record<string, string>;
};

export type DimensionEntry = {
  code: Code;
  label: string | null;
  description: string | null;
  defined: boolean;
};

export type DimensionTable = {
  variable: string;
  description: string | null;
  entries: DimensionEntry[];
  undefinedCodes: Code[];
};

export type FixedBand = {
  lower: number;
  upper: number;
  label: string;
};

export type UpperBoundBand = {
  upper: number;
  label: string;
};

export type QuantileBucketResult =
  | { kind: 'ok'; labels: string[]; edges: number[] }
  | { kind: 'fallback'; labels: string[]; reason: string };

export type ZeroWeightPolicy = 'zero' | 'omit';

export type StatisticSort = {
  by: 'percentage' | 'group';
  direction: 'asc' | 'desc';
};

export type WeightedStatistic = {
  dimensionValue: CellValue;
  percentage: number;
  populationEstimate: number;
  sampleSize: number;
};

export type LabeledStatistic = WeightedStatistic & {
  label: string | null;
};

export type IndicatorDefinition = {
  name: string;
  column: string;
  value: CellValue;
  missingValue?: CellValue;
};

export type IndicatorStatistic = {
  dimensionValue: CellValue;
  indicators: Record<string, { percentage: number; populationEstimate: number } | null>;
};

export type StatisticSummary<T extends WeightedStatistic = WeightedStatistic> = {
  highest: T;
  lowest: T;
  range: number;
  mean: number;
};

export type PipelineDiagnostic =
  | { kind: 'missing-definition'; variable: string }
  | { kind: 'undefined-codes'; variable: string; codes: CellValue[] }
  | { kind: 'quantile-fallback'; variable: string; reason: string };

export type CodebookSummary = {
  id: string;
  name: string;
  variableCount: number;
};

export type StarSchema = {
  fact: FactRelation;
  dimensions: Record<string, DimensionTable>;
  bucketColumns: string[];
  diagnostics: PipelineDiagnostic[];
};

export type DimensionAnalysis = {
  dimension: string;
  statistics: LabeledStatistic[];
  summary: StatisticSummary<LabeledStatistic> | null;
};
