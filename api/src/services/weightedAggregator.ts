import { MalformedFactError, MissingColumnError } from '../models/errors.js';
import type {
  CellValue,
  DimensionTable,
  FactRelation,
  FactRow,
  IndicatorDefinition,
  IndicatorStatistic,
  LabeledStatistic,
  StatisticSort,
  StatisticSummary,
  WeightedStatistic,
  ZeroWeightPolicy
} from '../models/types.js';
import { codeKey, compareCellValues, parseCode } from './codes.js';

export type AggregateOptions = {
  groupColumn: string;
  weightColumn: string;
  conditionColumn: string;
  conditionValue?: CellValue;
  missingValue?: CellValue;
  zeroWeightPolicy?: ZeroWeightPolicy;
  sort?: StatisticSort;
};

export type IndicatorOptions = {
  groupColumn: string;
  weightColumn: string;
  indicators: readonly IndicatorDefinition[];
  zeroWeightPolicy?: ZeroWeightPolicy;
};

type GroupTotals = {
  value: CellValue;
  totalWeight: number;
  conditionWeight: number;
  sampleSize: number;
};

const DEFAULT_SORT: StatisticSort = { by: 'percentage', direction: 'desc' };

function requireColumns(fact: FactRelation, columns: readonly string[]): void {
  for (const column of columns) {
    if (!fact.columns.includes(column)) {
      throw new MissingColumnError(column);
    }
  }
}

function cellKey(value: CellValue): string {
  return codeKey(parseCode(value));
}

function matches(cell: CellValue | undefined, expected: CellValue): boolean {
  return cell !== undefined && cellKey(cell) === cellKey(expected);
}

function readWeight(row: FactRow, weightColumn: string, rowIndex: number): number {
  const weight = row[weightColumn];
  if (typeof weight !== 'number' || !Number.isFinite(weight)) {
    throw new MalformedFactError(`Weight column "${weightColumn}" must hold finite numbers`, rowIndex);
  }
  return weight;
}

export function weightedPercentage(conditionWeight: number, totalWeight: number): number {
  return totalWeight === 0 ? 0 : (conditionWeight * 100) / totalWeight;
}

export function excludeMissing(fact: FactRelation, column: string, sentinel: CellValue): FactRelation {
  requireColumns(fact, [column]);
  return { columns: fact.columns, rows: fact.rows.filter((row) => !matches(row[column], sentinel)) };
}

function accumulate(
  fact: FactRelation,
  groupColumn: string,
  weightColumn: string,
  conditionColumn: string,
  conditionValue: CellValue,
  missingValue: CellValue | undefined
): Map<string, GroupTotals> {
  const groups = new Map<string, GroupTotals>();
  fact.rows.forEach((row, index) => {
    const condition = row[conditionColumn];
    if (missingValue !== undefined && matches(condition, missingValue)) {
      return;
    }
    const group = row[groupColumn];
    if (group === undefined) {
      throw new MalformedFactError(`Fact row ${index} has no value for column "${groupColumn}"`, index);
    }
    const weight = readWeight(row, weightColumn, index);
    const key = cellKey(group);
    const totals = groups.get(key) ?? { value: group, totalWeight: 0, conditionWeight: 0, sampleSize: 0 };
    totals.totalWeight += weight;
    totals.sampleSize += 1;
    if (matches(condition, conditionValue)) {
      totals.conditionWeight += weight;
    }
    groups.set(key, totals);
  });
  return groups;
}

export function sortStatistics<T extends WeightedStatistic>(statistics: T[], sort: StatisticSort = DEFAULT_SORT): T[] {
  const sign = sort.direction === 'asc' ? 1 : -1;
  return statistics.sort((a, b) => {
    if (sort.by === 'percentage' && a.percentage !== b.percentage) {
      return sign * (a.percentage - b.percentage);
    }
    const byGroup = compareCellValues(a.dimensionValue, b.dimensionValue);
    return sort.by === 'group' ? sign * byGroup : byGroup;
  });
}

/**
 * Weighted share of each group satisfying `conditionColumn == conditionValue`. Rows carrying the
 * missing-data sentinel in the condition column are dropped before anything is summed, so
 * "unknown" never counts as "no". A group with zero total weight reports 0% unless the
 * zero-weight policy omits it.
 */
export function aggregateWeighted(fact: FactRelation, options: AggregateOptions): WeightedStatistic[] {
  const { groupColumn, weightColumn, conditionColumn } = options;
  requireColumns(fact, [groupColumn, weightColumn, conditionColumn]);

  const groups = accumulate(
    fact,
    groupColumn,
    weightColumn,
    conditionColumn,
    options.conditionValue ?? 1,
    options.missingValue
  );

  const statistics: WeightedStatistic[] = [];
  for (const totals of groups.values()) {
    if (totals.totalWeight === 0 && options.zeroWeightPolicy === 'omit') {
      continue;
    }
    statistics.push({
      dimensionValue: totals.value,
      percentage: weightedPercentage(totals.conditionWeight, totals.totalWeight),
      populationEstimate: totals.totalWeight,
      sampleSize: totals.sampleSize
    } satisfies WeightedStatistic);
  }

  return sortStatistics(statistics, options.sort);
}

export function aggregateIndicators(fact: FactRelation, options: IndicatorOptions): IndicatorStatistic[] {
  const { groupColumn, weightColumn, indicators } = options;
  requireColumns(fact, [groupColumn, weightColumn, ...indicators.map((indicator) => indicator.column)]);

  const byGroup = new Map<string, IndicatorStatistic>();
  for (const indicator of indicators) {
    const groups = accumulate(fact, groupColumn, weightColumn, indicator.column, indicator.value, indicator.missingValue);
    for (const [key, totals] of groups) {
      // A group is kept only while some indicator gives it weight.
      if (totals.totalWeight === 0 && options.zeroWeightPolicy === 'omit') {
        continue;
      }
      const row: IndicatorStatistic = byGroup.get(key) ?? { dimensionValue: totals.value, indicators: {} };
      row.indicators[indicator.name] = {
        percentage: weightedPercentage(totals.conditionWeight, totals.totalWeight),
        populationEstimate: totals.totalWeight
      };
      byGroup.set(key, row);
    }
  }

  const rows = [...byGroup.values()];
  for (const row of rows) {
    for (const indicator of indicators) {
      row.indicators[indicator.name] = row.indicators[indicator.name] ?? null;
    }
  }
  return rows.sort((a, b) => compareCellValues(a.dimensionValue, b.dimensionValue));
}

export function mergeLabels(statistics: readonly WeightedStatistic[], table: DimensionTable | undefined): LabeledStatistic[] {
  const labels = new Map<string, string | null>();
  for (const entry of table?.entries ?? []) {
    labels.set(codeKey(entry.code), entry.label);
  }
  return statistics.map((statistic) => ({
    ...statistic,
    label: labels.get(cellKey(statistic.dimensionValue)) ?? null
  }));
}

export function summarizeStatistics<T extends WeightedStatistic>(statistics: readonly T[]): StatisticSummary<T> | null {
  const [first] = statistics;
  if (first === undefined) {
    return null;
  }
  let highest = first;
  let lowest = first;
  let total = 0;
  for (const statistic of statistics) {
    if (statistic.percentage > highest.percentage) {
      highest = statistic;
    }
    if (statistic.percentage < lowest.percentage) {
      lowest = statistic;
    }
    total += statistic.percentage;
  }
  return {
    highest,
    lowest,
    range: highest.percentage - lowest.percentage,
    mean: total / statistics.length
  };
}
