import { MalformedFactError, MissingMeasureError } from '../models/errors.js';
import type { CellValue, FactRelation, FactRow } from '../models/types.js';

export type ProjectionOptions = {
  exclude: Iterable<string>;
  requiredMeasures: Iterable<string>;
};

function isCellValue(value: unknown): value is CellValue {
  return (typeof value === 'number' && Number.isFinite(value)) || typeof value === 'string';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createFactRelation(rows: unknown): FactRelation {
  if (!Array.isArray(rows)) {
    throw new MalformedFactError('Fact relation must be an array of rows');
  }
  const [first] = rows;
  if (first === undefined) {
    return { columns: [], rows: [] };
  }
  if (!isRecord(first)) {
    throw new MalformedFactError('Fact row must be an object of column values', 0);
  }
  const columns = Object.keys(first);
  const columnSet = new Set(columns);

  const validated = rows.map((row: unknown, index): FactRow => {
    if (!isRecord(row)) {
      throw new MalformedFactError('Fact row must be an object of column values', index);
    }
    const keys = Object.keys(row);
    if (keys.length !== columnSet.size || keys.some((key) => !columnSet.has(key))) {
      throw new MalformedFactError(
        `Fact row ${index} has columns [${keys.join(', ')}], expected [${columns.join(', ')}]`,
        index
      );
    }
    const result: FactRow = {};
    for (const key of keys) {
      const value = row[key];
      if (!isCellValue(value)) {
        throw new MalformedFactError(`Fact row ${index} has a non-finite or non-scalar value in column "${key}"`, index);
      }
      result[key] = value;
    }
    return result;
  });

  return { columns, rows: validated };
}

export function hasColumn(fact: FactRelation, column: string): boolean {
  return fact.columns.includes(column);
}

export function projectFact(fact: FactRelation, options: ProjectionOptions): FactRelation {
  const exclude = new Set(options.exclude);
  for (const measure of options.requiredMeasures) {
    if (!hasColumn(fact, measure) || exclude.has(measure)) {
      throw new MissingMeasureError(measure);
    }
  }

  const columns = fact.columns.filter((column) => !exclude.has(column));
  if (columns.length === fact.columns.length) {
    return { columns, rows: fact.rows.map((row) => ({ ...row })) };
  }
  const rows = fact.rows.map((row) => {
    const projected: FactRow = {};
    for (const column of columns) {
      const value = row[column];
      if (value !== undefined) {
        projected[column] = value;
      }
    }
    return projected;
  });
  return { columns, rows };
}

export function columnValues(fact: FactRelation, column: string): CellValue[] {
  return fact.rows.map((row, index) => {
    const value = row[column];
    if (value === undefined) {
      throw new MalformedFactError(`Fact row ${index} has no value for column "${column}"`, index);
    }
    return value;
  });
}

export function appendColumn(fact: FactRelation, name: string, values: readonly CellValue[]): FactRelation {
  if (values.length !== fact.rows.length) {
    throw new MalformedFactError(
      `Derived column "${name}" has ${values.length} values for ${fact.rows.length} rows`
    );
  }
  const columns = fact.columns.includes(name) ? [...fact.columns] : [...fact.columns, name];
  const rows = fact.rows.map((row, index) => {
    const value = values[index];
    return value === undefined ? { ...row } : { ...row, [name]: value };
  });
  return { columns, rows };
}

export function dimensionColumns(
  fact: FactRelation,
  options: { measures: Iterable<string>; exclude: Iterable<string> }
): string[] {
  const skip = new Set([...options.measures, ...options.exclude]);
  return fact.columns.filter((column) => !skip.has(column));
}
