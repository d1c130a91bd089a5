import { describe, expect, it } from 'vitest';

import { MalformedCodebookError } from '../src/models/errors.js';
import { createCodebookIndex } from '../src/services/codebookIndex.js';

describe('createCodebookIndex', () => {
  it('looks up definitions by variable name', () => {
    const index = createCodebookIndex({
      SEX: { description: 'Sex', codes: { '1': 'Male', '2': 'Female' } },
      EDUC: { description: 'Education', codes: { '06': 'Grade 12' } }
    });

    expect(index.size).toBe(2);
    expect(index.variables()).toEqual(['EDUC', 'SEX']);
    expect(index.definitionOf('SEX')).toEqual({ description: 'Sex', codes: { '1': 'Male', '2': 'Female' } });
    expect(index.has('EDUC')).toBe(true);
  });

  it('reports a missing variable as undefined', () => {
    const index = createCodebookIndex({});
    expect(index.definitionOf('STATEFIP')).toBeUndefined();
    expect(index.has('STATEFIP')).toBe(false);
  });

  it('defaults a missing description to an empty string', () => {
    const index = createCodebookIndex({ REGION: { codes: { '11': 'New England Division' } } });
    expect(index.definitionOf('REGION')?.description).toBe('');
  });

  it('freezes definitions', () => {
    const index = createCodebookIndex({ SEX: { description: 'Sex', codes: { '1': 'Male' } } });
    const definition = index.definitionOf('SEX');
    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition?.codes)).toBe(true);
  });

  it('rejects a label that is not a string and names its path', () => {
    try {
      createCodebookIndex({ SEX: { description: 'Sex', codes: { '1': 5 } } });
      expect.unreachable('codebook should have been rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedCodebookError);
      expect(error).toMatchObject({ path: 'SEX.codes.1', fatal: true });
    }
  });

  it('rejects a codebook that is not a mapping', () => {
    expect(() => createCodebookIndex(['SEX'])).toThrow(MalformedCodebookError);
    expect(() => createCodebookIndex(null)).toThrow(MalformedCodebookError);
  });
});
