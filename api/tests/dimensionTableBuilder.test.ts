import { describe, expect, it } from 'vitest';

import type { CellValue, VariableDefinition } from '../src/models/types.js';
import { codeKey, codeValue, parseCode } from '../src/services/codes.js';
import {
  buildDimensionTable,
  buildUnlabeledDimensionTable,
  verifyDimensionTable
} from '../src/services/dimensionTableBuilder.js';

const internet: VariableDefinition = { description: 'Access to internet', codes: { '1': 'Yes', '2': 'No' } };

describe('buildDimensionTable', () => {
  it('synthesizes labels for codes found only in the data', () => {
    const table = buildDimensionTable('CINETHH', [1, 2, 3, 3, 1], internet);

    expect(table.entries).toEqual([
      { code: { kind: 'numeric', value: 1 }, label: 'Yes', description: 'Access to internet', defined: true },
      { code: { kind: 'numeric', value: 2 }, label: 'No', description: 'Access to internet', defined: true },
      {
        code: { kind: 'numeric', value: 3 },
        label: 'Undefined code: 3',
        description: 'Access to internet',
        defined: false
      }
    ]);
    expect(table.undefinedCodes.map(codeValue)).toEqual([3]);
  });

  it('keeps declared codes absent from the data', () => {
    const table = buildDimensionTable('CINETHH', [2], internet);
    expect(table.entries.map((entry) => codeValue(entry.code))).toEqual([1, 2]);
    expect(table.undefinedCodes).toEqual([]);
  });

  it('matches zero-padded declared codes against numeric observations', () => {
    const table = buildDimensionTable('EDUC', [6, 10], {
      description: 'Education',
      codes: { '06': 'Grade 12', '10': '4 years of college' }
    });
    expect(table.entries.map((entry) => entry.label)).toEqual(['Grade 12', '4 years of college']);
  });

  it('sorts numeric codes before symbolic codes', () => {
    const table = buildDimensionTable('MIXED', [2, 7], {
      description: 'Mixed codes',
      codes: { B: 'Bee', '10': 'Ten', A: 'Ay', '02': 'Two' }
    });
    expect(table.entries.map((entry) => codeValue(entry.code))).toEqual([2, 7, 10, 'A', 'B']);
    expect(table.entries.map((entry) => entry.label)).toEqual(['Two', 'Undefined code: 7', 'Ten', 'Ay', 'Bee']);
  });

  it('keeps one entry when declared codes canonicalise to the same value', () => {
    const table = buildDimensionTable('SEX', [1], { description: 'Sex', codes: { '01': 'Male', '1': 'Male' } });
    expect(table.entries).toHaveLength(1);
  });

  it('covers exactly the union of declared and observed codes', () => {
    const columns: CellValue[][] = [
      [],
      [1, 1, 1],
      [4, 5, 6, 1],
      ['X', 2, 'X', 99],
      [0, -1, 2, 3, 3, 3]
    ];
    const definition: VariableDefinition = { description: 'Test', codes: { '1': 'One', '2': 'Two', Z: 'Zed' } };

    for (const column of columns) {
      const table = buildDimensionTable('TEST', column, definition);
      const keys = table.entries.map((entry) => codeKey(entry.code));
      const expected = new Set([...Object.keys(definition.codes), ...column].map((value) => codeKey(parseCode(value))));

      expect(new Set(keys)).toEqual(expected);
      expect(keys).toHaveLength(expected.size);
    }
  });
});

describe('buildUnlabeledDimensionTable', () => {
  it('lists observed codes with no labels', () => {
    const table = buildUnlabeledDimensionTable('SEX', [3, 1, 3, 'X']);
    expect(table.description).toBeNull();
    expect(table.entries.map((entry) => codeValue(entry.code))).toEqual([1, 3, 'X']);
    expect(table.entries.every((entry) => entry.label === null && entry.description === null)).toBe(true);
  });
});

describe('verifyDimensionTable', () => {
  it('reports missing codes, extra codes and label mismatches', () => {
    const table = buildDimensionTable('CINETHH', [1, 2, 3], internet);
    const report = verifyDimensionTable(table, {
      description: 'Access to internet',
      codes: { '1': 'Yes', '2': 'Nope', '4': 'Maybe' }
    });

    expect(report).toEqual({
      variable: 'CINETHH',
      missingCodes: ['4'],
      extraCodes: ['3'],
      labelMismatches: [{ code: '2', expected: 'Nope', found: 'No' }]
    });
  });

  it('is clean for a table built from the same definition', () => {
    const table = buildDimensionTable('CINETHH', [1, 2], internet);
    expect(verifyDimensionTable(table, internet)).toEqual({
      variable: 'CINETHH',
      missingCodes: [],
      extraCodes: [],
      labelMismatches: []
    });
  });
});
