import type { Server } from 'node:http';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from '../src/app.js';
import { loadAnalysisConfig } from '../src/config/analysis.js';
import { CodebookService } from '../src/services/codebookService.js';
import { StarSchemaService } from '../src/services/starSchemaService.js';

const rows = [
  { YEAR: 2023, PERNUM: 1, STATEFIP: 1, SEX: 1, PERWT: 10, AGE: 17, INCTOT: 0, CINETHH: 1 },
  { YEAR: 2023, PERNUM: 2, STATEFIP: 1, SEX: 2, PERWT: 10, AGE: 30, INCTOT: 25000, CINETHH: 2 },
  { YEAR: 2023, PERNUM: 1, STATEFIP: 2, SEX: 1, PERWT: 5, AGE: 70, INCTOT: 90000, CINETHH: 1 },
  { YEAR: 2023, PERNUM: 2, STATEFIP: 3, SEX: 2, PERWT: 5, AGE: -1, INCTOT: -300, CINETHH: 9 }
];

let server: Server;
let baseUrl: string;

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

async function createDataset(datasetRows: unknown[]): Promise<string> {
  const response = await post('/api/v1/datasets', { name: 'route sample', rows: datasetRows });
  const body: { id: string } = await response.json();
  return body.id;
}

beforeAll(async () => {
  const app = createApp({
    codebookService: new CodebookService(null),
    starSchemaService: new StarSchemaService(loadAnalysisConfig({}))
  });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

describe('API routes', () => {
  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/v1/healthz`);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('lists codebooks', async () => {
    const response = await fetch(`${baseUrl}/api/v1/codebooks`);
    expect(await response.json()).toEqual([
      { id: 'acs-household-access', name: 'ACS household technology access', variableCount: 8 }
    ]);
  });

  it('rejects an invalid dataset payload', async () => {
    const response = await post('/api/v1/datasets', { name: '', rows: [] });
    expect(response.status).toBe(400);
  });

  it('builds a schema, analyzes it and exports CSV', async () => {
    const datasetId = await createDataset(rows);

    const schemaResponse = await post(`/api/v1/datasets/${datasetId}/schema`, { codebookId: 'acs-household-access' });
    expect(schemaResponse.status).toBe(200);
    const schema = await schemaResponse.json();
    expect(schema.dimensions).toEqual([
      'STATEFIP',
      'SEX',
      'CINETHH',
      'AGE_BUCKET',
      'AGE_GROUP',
      'INCTOT_BUCKET',
      'INCTOT_GROUP'
    ]);
    expect(schema.diagnostics).toEqual([
      { kind: 'undefined-codes', variable: 'STATEFIP', codes: [3] },
      {
        kind: 'quantile-fallback',
        variable: 'INCTOT',
        reason: '2 distinct positive values cannot form 7 quantile buckets'
      }
    ]);

    const dimensionCsv = await (
      await fetch(`${baseUrl}/api/v1/datasets/${datasetId}/dimensions/STATEFIP/export.csv`)
    ).text();
    const lines = dimensionCsv.split('\n');
    expect(lines[0]).toBe('STATEFIP,STATEFIP_value,STATEFIP_desc');
    expect(lines[1]).toBe('1,Alabama,State (FIPS code)');
    expect(lines).toContain('3,Undefined code: 3,State (FIPS code)');

    const analysisResponse = await post(`/api/v1/datasets/${datasetId}/analyses`, { dimensions: ['STATEFIP'] });
    const [analysis] = await analysisResponse.json();
    expect(analysis.statistics[0]).toEqual({
      dimensionValue: 2,
      percentage: 100,
      populationEstimate: 5,
      sampleSize: 1,
      label: 'Alaska'
    });

    const statsCsv = await (await fetch(`${baseUrl}/api/v1/datasets/${datasetId}/analyses/STATEFIP/export.csv`)).text();
    expect(statsCsv.split('\n').slice(0, 3)).toEqual([
      'dimension_value,label,percentage,population_estimate,sample_size',
      '2,Alaska,100,5,1',
      '1,Alabama,50,20,2'
    ]);
  });

  it('serializes dimension codes as plain values', async () => {
    const datasetId = await createDataset(rows);
    await post(`/api/v1/datasets/${datasetId}/schema`, { codebookId: 'acs-household-access' });

    const response = await fetch(`${baseUrl}/api/v1/datasets/${datasetId}/dimensions/SEX`);
    const table = await response.json();
    expect(table.entries[0]).toEqual({ code: 1, label: 'Male', description: 'Sex', defined: true });
  });

  it('verifies built dimensions against the codebook', async () => {
    const datasetId = await createDataset(rows);
    await post(`/api/v1/datasets/${datasetId}/schema`, { codebookId: 'acs-household-access' });

    const response = await post(`/api/v1/datasets/${datasetId}/verification`, { codebookId: 'acs-household-access' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([
      { variable: 'STATEFIP', missingCodes: [], extraCodes: ['3'], labelMismatches: [] },
      { variable: 'SEX', missingCodes: [], extraCodes: [], labelMismatches: [] },
      { variable: 'CINETHH', missingCodes: [], extraCodes: [], labelMismatches: [] }
    ]);
  });

  it('answers 404 for unknown datasets and codebooks', async () => {
    expect((await fetch(`${baseUrl}/api/v1/datasets/unknown`)).status).toBe(404);

    const datasetId = await createDataset(rows);
    const response = await post(`/api/v1/datasets/${datasetId}/schema`, { codebookId: 'unknown' });
    expect(response.status).toBe(404);
  });

  it('answers 422 when the weight measure is missing', async () => {
    const datasetId = await createDataset([{ STATEFIP: 1, CINETHH: 1 }]);
    const response = await post(`/api/v1/datasets/${datasetId}/schema`, { codebookId: 'acs-household-access' });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      message: 'Required measure column "PERWT" is missing from the fact relation',
      entity: 'PERWT'
    });
  });
});
