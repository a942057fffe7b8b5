import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import pino from 'pino';
import type { ExportRow } from './domain/types.js';
import { IngestionError } from './errors.js';
import type { FigureDocument } from './render/figure.js';
import { createDashboardServer } from './server.js';

function row(commodityName: string, categoryCode: string, value: number | null, month: number): ExportRow {
  return {
    commodityName,
    categoryCode,
    period: new Date(Date.UTC(2024, month, 1)),
    value,
    quantity: 10,
    unitPrice: value === null ? null : value / 10,
    province: 'Saskatchewan',
  };
}

const rows: ExportRow[] = [
  row('Wheat A', '1001.19', 100, 0),
  row('Wheat B', '1001.99', 50, 1),
  row('Barley C', '1003.90', 200, 0),
  row('Oats D', '1004.90', 999, 0),
];

describe('export-dashboard api', () => {
  const logger = pino({ level: 'silent' });
  let loads = 0;
  const server = createDashboardServer({
    loadRows: async () => {
      loads++;
      return rows;
    },
    corsOrigins: ['http://localhost:4173'],
    logger,
  });

  beforeAll(async () => {
    await server.app.ready();
  });

  afterAll(async () => {
    await server.stop();
  });

  it('reports health', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('serves the figure document and builds it once', async () => {
    const first = await server.app.inject({ method: 'GET', url: '/api/dashboard' });
    const second = await server.app.inject({ method: 'GET', url: '/api/dashboard' });
    expect(first.statusCode).toBe(200);
    const figure = first.json<FigureDocument>();
    expect(figure.data.map((d) => d.name)).toEqual([
      '(Top 3) [1001.99] Wheat B',
      '(Top 2) [1001.19] Wheat A',
      '(Top 1) [1003.90] Barley C',
      'TOTAL Trend',
    ]);
    expect(second.json()).toEqual(figure);
    expect(loads).toBe(1);
    expect(first.headers['access-control-allow-origin']).toBe('http://localhost:4173');
  });

  it('lists top commodities', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/api/dashboard/top-commodities' });
    const body = res.json<{ data: Array<{ rank: number; commodityName: string; totalValue: number }> }>();
    expect(body.data.map((c) => [c.rank, c.commodityName, c.totalValue])).toEqual([
      [1, 'Barley C', 200],
      [2, 'Wheat A', 100],
      [3, 'Wheat B', 50],
    ]);
  });

  it('lists categories in canonical order', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/api/dashboard/categories' });
    expect(res.json()).toEqual({
      data: [
        { category: 'Barley Family', totalValue: 200, commodities: ['(Top 1) [1003.90] Barley C'] },
        {
          category: 'Wheat Complex',
          totalValue: 150,
          commodities: ['(Top 2) [1001.19] Wheat A', '(Top 3) [1001.99] Wheat B'],
        },
      ],
    });
  });

  it('rebuilds on refresh', async () => {
    const before = loads;
    const res = await server.app.inject({ method: 'POST', url: '/api/dashboard/refresh' });
    expect(res.json()).toEqual({ status: 'ok', rows: 3 });
    expect(loads).toBe(before + 1);
  });
});

describe('export-dashboard api without configured origins', () => {
  it('sends no CORS headers', async () => {
    const server = createDashboardServer({ loadRows: async () => rows, logger: pino({ level: 'silent' }) });
    const res = await server.app.inject({ method: 'GET', url: '/health', headers: { origin: 'http://elsewhere.test' } });
    expect(res.statusCode).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
    await server.stop();
  });
});

describe('export-dashboard api with a broken source', () => {
  const logger = pino({ level: 'silent' });

  it('maps ingestion failures to 502 and retries on the next request', async () => {
    let attempts = 0;
    const server = createDashboardServer({
      loadRows: async () => {
        attempts++;
        throw new IngestionError('cannot read export report at missing.csv');
      },
      logger,
    });
    const first = await server.app.inject({ method: 'GET', url: '/api/dashboard' });
    expect(first.statusCode).toBe(502);
    expect(first.json()).toEqual({ error: 'cannot read export report at missing.csv' });

    await server.app.inject({ method: 'GET', url: '/api/dashboard' });
    expect(attempts).toBe(2);
    await server.stop();
  });

  it('maps other failures to 500', async () => {
    const server = createDashboardServer({
      loadRows: async () => {
        throw new Error('boom');
      },
      logger,
    });
    const res = await server.app.inject({ method: 'GET', url: '/api/dashboard' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'boom' });
    await server.stop();
  });
});
