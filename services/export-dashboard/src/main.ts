import { writeFile } from 'node:fs/promises';
import pino, { type Logger } from 'pino';
import { loadConfig, type DashboardConfig } from './config.js';
import { isIngestionError } from './errors.js';
import { loadExportReport } from './ingest.js';
import { buildDashboard } from './pipeline.js';
import { createDashboardServer } from './server.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

// Ingestion failures exit with their own code.
export const EXIT_INGESTION_FAILED = 2;
export const EXIT_FAILED = 1;

export async function generate(cfg: DashboardConfig, log: Logger = logger) {
  const rows = await loadExportReport(cfg.csvPath, { region: cfg.region, logger: log });
  const dashboard = buildDashboard(rows, { title: cfg.title, logger: log });
  await writeFile(cfg.outputPath, JSON.stringify(dashboard.figure, null, 2), 'utf8');
  log.info(
    { outputPath: cfg.outputPath, traces: dashboard.plan.traces.length, months: dashboard.plan.months.length },
    'dashboard written'
  );
}

export async function serve(cfg: DashboardConfig) {
  const server = createDashboardServer({
    loadRows: () => loadExportReport(cfg.csvPath, { region: cfg.region, logger }),
    title: cfg.title,
    port: cfg.port,
    host: cfg.host,
    corsOrigins: cfg.corsOrigins,
    logger,
  });
  await server.start();
}

export async function main(argv: string[] = process.argv.slice(2)) {
  const cfg = loadConfig();
  const command = argv[0] ?? 'generate';
  switch (command) {
    case 'generate':
      return generate(cfg);
    case 'serve':
      return serve(cfg);
    default:
      throw new Error(`unknown command ${command} (expected generate or serve)`);
  }
}

if (process.env.NODE_ENV !== 'test') {
  main().catch((err) => {
    if (isIngestionError(err)) {
      logger.error({ err, filePath: err.filePath }, 'ingestion failed');
      process.exit(EXIT_INGESTION_FAILED);
    }
    logger.error({ err }, 'dashboard generation failed');
    process.exit(EXIT_FAILED);
  });
}
