import { z } from 'zod';

import { MalformedCodebookError } from '../models/errors.js';
import type { VariableDefinition } from '../models/types.js';

export const variableDefinitionSchema = z.object({
  description: z.string().default(''),
  codes: z.record(z.string())
});

export const codebookSchema = z.record(z.string().min(1), variableDefinitionSchema);

export type CodebookInput = z.input<typeof codebookSchema>;

export class CodebookIndex {
  private readonly definitions: ReadonlyMap<string, Readonly<VariableDefinition>>;

  constructor(definitions: Record<string, VariableDefinition>) {
    const entries = Object.entries(definitions).map(
      ([name, definition]) =>
        [name, Object.freeze({ description: definition.description, codes: Object.freeze({ ...definition.codes }) })] as const
    );
    this.definitions = new Map(entries);
  }

  get size(): number {
    return this.definitions.size;
  }

  definitionOf(variable: string): Readonly<VariableDefinition> | undefined {
    return this.definitions.get(variable);
  }

  has(variable: string): boolean {
    return this.definitions.has(variable);
  }

  variables(): string[] {
    return [...this.definitions.keys()].sort();
  }
}

export function createCodebookIndex(raw: unknown): CodebookIndex {
  const parseResult = codebookSchema.safeParse(raw);
  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new MalformedCodebookError(
      `Malformed codebook${path ? ` at "${path}"` : ''}: ${issue?.message ?? 'invalid structure'}`,
      path || 'codebook'
    );
  }
  return new CodebookIndex(parseResult.data);
}
