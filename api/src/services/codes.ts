import type { CellValue, Code } from '../models/types.js';

const INTEGER_LITERAL = /^[+-]?\d+$/;

export function parseCode(raw: CellValue): Code {
  if (typeof raw === 'number') {
    return { kind: 'numeric', value: raw };
  }
  const trimmed = raw.trim();
  if (INTEGER_LITERAL.test(trimmed)) {
    return { kind: 'numeric', value: Number.parseInt(trimmed, 10) };
  }
  return { kind: 'symbolic', value: raw };
}

// Declared and observed codes are matched on this key, so "1", "01" and 1 collide.
export function codeKey(code: Code): string {
  return code.kind === 'numeric' ? `n:${code.value}` : `s:${code.value}`;
}

export function codeValue(code: Code): CellValue {
  return code.value;
}

export function formatCode(code: Code): string {
  return String(code.value);
}

/** Numeric codes first (ascending), then symbolic codes in ordinal string order. */
export function compareCodes(a: Code, b: Code): number {
  if (a.kind === 'numeric' && b.kind === 'numeric') {
    return a.value - b.value;
  }
  if (a.kind === 'numeric') {
    return -1;
  }
  if (b.kind === 'numeric') {
    return 1;
  }
  if (a.value === b.value) {
    return 0;
  }
  return a.value < b.value ? -1 : 1;
}

export function compareCellValues(a: CellValue, b: CellValue): number {
  return compareCodes(parseCode(a), parseCode(b));
}
