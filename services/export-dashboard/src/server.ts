import Fastify from 'fastify';
import pino, { type Logger } from 'pino';
import type { ExportRow } from './domain/types.js';
import { IngestionError } from './errors.js';
import { buildDashboard, type Dashboard } from './pipeline.js';

type ServerOptions = {
  loadRows: () => Promise<ExportRow[]>;
  title?: string;
  port?: number;
  host?: string;
  corsOrigins?: string[];
  logger?: Logger;
};

export function createDashboardServer(options: ServerOptions) {
  const logger = options.logger ?? pino({ level: process.env.LOG_LEVEL || 'info' });
  const app = Fastify({ logger });

  const port = options.port ?? Number(process.env.PORT || 8080);
  const host = options.host ?? '0.0.0.0';
  const corsOrigins = options.corsOrigins ?? [];

  let current: Promise<Dashboard> | null = null;

  async function rebuild(): Promise<Dashboard> {
    const rows = await options.loadRows();
    return buildDashboard(rows, { title: options.title, logger });
  }

  function getDashboard(): Promise<Dashboard> {
    if (!current) {
      // A failed build is not cached; the next request retries.
      current = rebuild().catch((err: unknown) => {
        current = null;
        throw err;
      });
    }
    return current;
  }

  // CORS headers are sent only when origins are configured.
  if (corsOrigins.length > 0) {
    app.addHook('onRequest', async (req, reply) => {
      const origin = req.headers.origin || '';
      const allowedOrigin = corsOrigins.includes(origin) ? origin : corsOrigins[0];
      reply.header('Access-Control-Allow-Origin', allowedOrigin);
      reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
      reply.header('Access-Control-Allow-Headers', 'Content-Type');
      if (req.method === 'OPTIONS') {
        return reply.code(204).send();
      }
    });
  }

  app.setErrorHandler((err, _request, reply) => {
    if (err instanceof IngestionError) {
      logger.error({ err }, 'ingestion failed');
      return reply.code(502).send({ error: err.message });
    }
    logger.error({ err }, 'dashboard request failed');
    return reply.code(err.statusCode ?? 500).send({ error: err.message });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/api/dashboard', async () => {
    const dashboard = await getDashboard();
    return dashboard.figure;
  });

  app.get('/api/dashboard/top-commodities', async () => {
    const dashboard = await getDashboard();
    return { data: dashboard.commodities.filter((c) => c.rank !== null) };
  });

  app.get('/api/dashboard/categories', async () => {
    const dashboard = await getDashboard();
    return { data: dashboard.categories };
  });

  app.post('/api/dashboard/refresh', async () => {
    current = null;
    const dashboard = await getDashboard();
    return { status: 'ok', rows: dashboard.stats.classified };
  });

  return {
    app,
    async start() {
      const address = await app.listen({ port, host });
      logger.info({ port, host, address }, 'export-dashboard api started');
      return address;
    },
    async stop() {
      await app.close();
    },
  };
}
