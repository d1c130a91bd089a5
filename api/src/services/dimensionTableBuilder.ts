import type { CellValue, Code, DimensionEntry, DimensionTable, VariableDefinition } from '../models/types.js';
import { codeKey, compareCodes, formatCode, parseCode } from './codes.js';

export type DimensionVerification = {
  variable: string;
  missingCodes: string[];
  extraCodes: string[];
  labelMismatches: Array<{ code: string; expected: string; found: string | null }>;
};

function distinctCodes(factColumn: readonly CellValue[]): Map<string, Code> {
  const observed = new Map<string, Code>();
  for (const value of factColumn) {
    const code = parseCode(value);
    const key = codeKey(code);
    if (!observed.has(key)) {
      observed.set(key, code);
    }
  }
  return observed;
}

function sortEntries(entries: DimensionEntry[]): DimensionEntry[] {
  return entries.sort((a, b) => compareCodes(a.code, b.code));
}

export function buildDimensionTable(
  variable: string,
  factColumn: readonly CellValue[],
  definition: Readonly<VariableDefinition>
): DimensionTable {
  const entries = new Map<string, DimensionEntry>();

  for (const [rawCode, label] of Object.entries(definition.codes)) {
    const code = parseCode(rawCode);
    const key = codeKey(code);
    if (entries.has(key)) {
      continue;
    }
    entries.set(key, { code, label, description: definition.description, defined: true });
  }

  const undefinedCodes: Code[] = [];
  for (const [key, code] of distinctCodes(factColumn)) {
    if (entries.has(key)) {
      continue;
    }
    undefinedCodes.push(code);
    entries.set(key, {
      code,
      label: `Undefined code: ${formatCode(code)}`,
      description: definition.description,
      defined: false
    });
  }

  return {
    variable,
    description: definition.description,
    entries: sortEntries([...entries.values()]),
    undefinedCodes: undefinedCodes.sort(compareCodes)
  } satisfies DimensionTable;
}

export function buildUnlabeledDimensionTable(variable: string, factColumn: readonly CellValue[]): DimensionTable {
  const entries = [...distinctCodes(factColumn).values()].map(
    (code) => ({ code, label: null, description: null, defined: false }) satisfies DimensionEntry
  );
  return {
    variable,
    description: null,
    entries: sortEntries(entries),
    undefinedCodes: []
  } satisfies DimensionTable;
}

export function verifyDimensionTable(
  table: DimensionTable,
  definition: Readonly<VariableDefinition>
): DimensionVerification {
  const declared = new Map<string, { raw: string; label: string }>();
  for (const [raw, label] of Object.entries(definition.codes)) {
    declared.set(codeKey(parseCode(raw)), { raw, label });
  }

  const present = new Map(table.entries.map((entry) => [codeKey(entry.code), entry] as const));

  const missingCodes = [...declared.entries()].filter(([key]) => !present.has(key)).map(([, { raw }]) => raw);
  const extraCodes = table.entries
    .filter((entry) => !declared.has(codeKey(entry.code)))
    .map((entry) => formatCode(entry.code));

  const labelMismatches: DimensionVerification['labelMismatches'] = [];
  for (const [key, { raw, label }] of declared) {
    const entry = present.get(key);
    if (entry && entry.label !== label) {
      labelMismatches.push({ code: raw, expected: label, found: entry.label });
    }
  }

  return { variable: table.variable, missingCodes, extraCodes, labelMismatches };
}
