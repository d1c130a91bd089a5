import { randomUUID } from 'node:crypto';

import type { Driver, QueryResult } from 'neo4j-driver';

import codebookSeed from '../data/codebook_seed.json' with { type: 'json' };
import { NotFoundError } from '../models/errors.js';
import type { CodebookSummary, VariableDefinition } from '../models/types.js';
import { logger } from '../utils/logger.js';
import { CodebookIndex, createCodebookIndex } from './codebookIndex.js';

type StoredCodebook = {
  summary: CodebookSummary;
  index: CodebookIndex;
};

function toStored(id: string, name: string, index: CodebookIndex): StoredCodebook {
  return { summary: { id, name, variableCount: index.size }, index };
}

function normalizeVariables(records: QueryResult['records']): Record<string, VariableDefinition> {
  const variables: Record<string, VariableDefinition> = {};
  for (const record of records) {
    const name: unknown = record.get('name');
    const description: unknown = record.get('description');
    const codes: unknown = record.get('codes');
    if (typeof name !== 'string' || !Array.isArray(codes)) {
      continue;
    }
    const codeMap: Record<string, string> = {};
    for (const entry of codes) {
      const code: unknown = entry?.code;
      const label: unknown = entry?.label;
      if ((typeof code === 'string' || typeof code === 'number') && typeof label === 'string') {
        codeMap[String(code)] = label;
      }
    }
    variables[name] = { description: typeof description === 'string' ? description : '', codes: codeMap };
  }
  return variables;
}

const seedCodebook = toStored(codebookSeed.codebookId, codebookSeed.name, createCodebookIndex(codebookSeed.variables));

export class CodebookService {
  private readonly uploaded = new Map<string, StoredCodebook>();

  constructor(private readonly driver: Driver | null) {}

  registerCodebook(name: string, definitions: unknown): CodebookSummary {
    const stored = toStored(randomUUID(), name, createCodebookIndex(definitions));
    this.uploaded.set(stored.summary.id, stored);
    logger.info({ codebookId: stored.summary.id, variables: stored.summary.variableCount }, 'Registered codebook');
    return stored.summary;
  }

  async listCodebooks(): Promise<CodebookSummary[]> {
    const local = [seedCodebook.summary, ...[...this.uploaded.values()].map((stored) => stored.summary)];
    if (!this.driver) {
      return local;
    }
    try {
      const session = this.driver.session();
      const result = await session.run(
        `MATCH (cb:Codebook)
         OPTIONAL MATCH (cb)-[:DEFINES]->(v:Variable)
         RETURN cb.id AS id, cb.name AS name, count(v) AS variableCount
         ORDER BY cb.name`
      );
      await session.close();
      const remote = result.records.map((record) => ({
        id: String(record.get('id')),
        name: String(record.get('name')),
        variableCount: Number(record.get('variableCount'))
      }));
      return [...local, ...remote];
    } catch (error) {
      logger.warn({ error }, 'Falling back to local codebook list');
      return local;
    }
  }

  async getCodebook(id: string): Promise<CodebookIndex> {
    if (id === seedCodebook.summary.id) {
      return seedCodebook.index;
    }
    const uploaded = this.uploaded.get(id);
    if (uploaded) {
      return uploaded.index;
    }
    if (!this.driver) {
      throw new NotFoundError('Codebook', id);
    }
    let records: QueryResult['records'];
    try {
      const session = this.driver.session();
      const result = await session.run(
        `MATCH (cb:Codebook { id: $id })-[:DEFINES]->(v:Variable)
         OPTIONAL MATCH (v)-[:HAS_CODE]->(c:Code)
         WITH v, collect({ code: c.code, label: c.label }) AS codes
         RETURN v.name AS name, v.description AS description, codes`,
        { id }
      );
      await session.close();
      records = result.records;
    } catch (error) {
      logger.warn({ error, codebookId: id }, 'Codebook lookup failed');
      throw new NotFoundError('Codebook', id);
    }
    if (records.length === 0) {
      throw new NotFoundError('Codebook', id);
    }
    return createCodebookIndex(normalizeVariables(records));
  }
}
