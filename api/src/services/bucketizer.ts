import type { CellValue, FixedBand, QuantileBucketResult, UpperBoundBand } from '../models/types.js';

export const UNKNOWN_BUCKET = 'Unknown';

export const DEFAULT_QUANTILE_LABELS = [
  'Very Low Income',
  'Low Income',
  'Lower Middle',
  'Middle',
  'Upper Middle',
  'High',
  'Very High'
] as const;

export const DEFAULT_FALLBACK_BANDS: readonly UpperBoundBand[] = [
  { upper: 0, label: 'No Income' },
  { upper: 20000, label: 'Very Low' },
  { upper: 40000, label: 'Low' },
  { upper: 60000, label: 'Middle' },
  { upper: 100000, label: 'High' },
  { upper: Number.POSITIVE_INFINITY, label: 'Very High' }
];

export type FixedBandOptions = {
  clampNegative?: boolean;
  unknownLabel?: string;
};

export type QuantileOptions = {
  quantiles?: number;
  labels?: readonly string[];
  zeroLabel?: string;
  unknownLabel?: string;
  fallbackBands?: readonly UpperBoundBand[];
  /** Values the edges are computed from; defaults to the values being labelled. */
  basis?: readonly (CellValue | null | undefined)[];
};

function toNumber(value: CellValue | null | undefined): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return Number.NaN;
}

export function assignFixedBand(
  value: CellValue | null | undefined,
  bands: readonly FixedBand[],
  options: FixedBandOptions = {}
): string {
  const unknownLabel = options.unknownLabel ?? UNKNOWN_BUCKET;
  let numeric = toNumber(value);
  if (Number.isNaN(numeric)) {
    return unknownLabel;
  }
  if ((options.clampNegative ?? true) && numeric < 0) {
    numeric = 0;
  }
  const band = bands.find((candidate) => candidate.lower <= numeric && numeric <= candidate.upper);
  return band ? band.label : unknownLabel;
}

export function bucketizeFixed(
  values: readonly (CellValue | null | undefined)[],
  bands: readonly FixedBand[],
  options: FixedBandOptions = {}
): string[] {
  return values.map((value) => assignFixedBand(value, bands, options));
}

// Right-closed bands: a value belongs to the first band whose upper bound it does not exceed.
export function assignUpperBoundBand(value: number, bands: readonly UpperBoundBand[], unknownLabel = UNKNOWN_BUCKET): string {
  if (Number.isNaN(value)) {
    return unknownLabel;
  }
  const band = bands.find((candidate) => value <= candidate.upper);
  return band ? band.label : unknownLabel;
}

/** Linear-interpolation quantile over an ascending-sorted array. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  const position = (sorted.length - 1) * q;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? Number.NaN;
  const upper = sorted[upperIndex] ?? Number.NaN;
  return lower + (upper - lower) * (position - lowerIndex);
}

type QuantileEdges = { kind: 'edges'; edges: number[] } | { kind: 'infeasible'; reason: string };

function computeQuantileEdges(sortedPositive: readonly number[], quantiles: number, labelCount: number): QuantileEdges {
  if (!Number.isInteger(quantiles) || quantiles < 1) {
    return { kind: 'infeasible', reason: `quantile count must be a positive integer, got ${quantiles}` };
  }
  if (labelCount < quantiles) {
    return { kind: 'infeasible', reason: `${labelCount} labels cannot name ${quantiles} quantile buckets` };
  }
  const distinct = new Set(sortedPositive).size;
  if (distinct < quantiles) {
    return {
      kind: 'infeasible',
      reason: `${distinct} distinct positive values cannot form ${quantiles} quantile buckets`
    };
  }
  const edges: number[] = [];
  for (let i = 0; i <= quantiles; i += 1) {
    const edge = quantile(sortedPositive, i / quantiles);
    if (edges.length === 0 || edge !== edges[edges.length - 1]) {
      edges.push(edge);
    }
  }
  return { kind: 'edges', edges };
}

function clampedValues(values: readonly (CellValue | null | undefined)[]): number[] {
  return values.map((value) => {
    const numeric = toNumber(value);
    return numeric < 0 ? 0 : numeric;
  });
}

/**
 * Quantile cut of a non-negative measure such as income. Zeros (after clamping negatives) get
 * `zeroLabel` and stay out of the quantile computation; non-finite values are `unknownLabel` on
 * every path. When the positive values cannot support the requested number of buckets, the fixed
 * fallback bands are applied to every row instead.
 *
 * With `basis`, edges and feasibility come from that subset while every value is still labelled;
 * the top bucket is then open above so values beyond the basis maximum land in it.
 */
export function bucketizeQuantiles(
  values: readonly (CellValue | null | undefined)[],
  options: QuantileOptions = {}
): QuantileBucketResult {
  const quantiles = options.quantiles ?? DEFAULT_QUANTILE_LABELS.length;
  const labels = options.labels ?? DEFAULT_QUANTILE_LABELS;
  const zeroLabel = options.zeroLabel ?? 'No Income';
  const unknownLabel = options.unknownLabel ?? UNKNOWN_BUCKET;
  const fallbackBands = options.fallbackBands ?? DEFAULT_FALLBACK_BANDS;

  const clamped = clampedValues(values);
  const positive = clampedValues(options.basis ?? values)
    .filter((value) => Number.isFinite(value) && value > 0)
    .sort((a, b) => a - b);

  const labelFor = (value: number, positiveLabel: (v: number) => string): string => {
    if (!Number.isFinite(value)) {
      return unknownLabel;
    }
    return value === 0 ? zeroLabel : positiveLabel(value);
  };

  if (positive.length === 0) {
    return {
      kind: 'ok',
      // Positive values can only appear here when they sit outside `basis`.
      labels: clamped.map((value) => labelFor(value, (v) => assignUpperBoundBand(v, fallbackBands, unknownLabel))),
      edges: []
    };
  }

  const attempt = computeQuantileEdges(positive, quantiles, labels.length);
  if (attempt.kind === 'infeasible') {
    return {
      kind: 'fallback',
      labels: clamped.map((value) =>
        Number.isFinite(value) ? assignUpperBoundBand(value, fallbackBands, unknownLabel) : unknownLabel
      ),
      reason: attempt.reason
    };
  }

  const { edges } = attempt;
  const bucketCount = Math.max(edges.length - 1, 1);
  const positiveLabel = (value: number): string => {
    for (let i = 0; i < bucketCount; i += 1) {
      const upper = i === bucketCount - 1 ? Number.POSITIVE_INFINITY : (edges[i + 1] ?? Number.POSITIVE_INFINITY);
      if (value <= upper) {
        return labels[i] ?? unknownLabel;
      }
    }
    return unknownLabel;
  };

  return {
    kind: 'ok',
    labels: clamped.map((value) => labelFor(value, positiveLabel)),
    edges
  };
}
