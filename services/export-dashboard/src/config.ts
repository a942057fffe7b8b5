import { DEFAULT_TITLE } from './render/figure.js';
import { DEFAULT_REGION } from './ingest.js';

export type DashboardConfig = {
  csvPath: string;
  outputPath: string;
  region: string;
  title: string;
  port: number;
  host: string;
  corsOrigins: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  return {
    csvPath: env.EXPORT_CSV_PATH || './SK-CN_2024-2025Oct_Report.csv',
    outputPath: env.EXPORT_OUTPUT_PATH || 'export_data.json',
    region: env.EXPORT_REGION || DEFAULT_REGION,
    title: env.DASHBOARD_TITLE || DEFAULT_TITLE,
    port: Number(env.PORT || 8080),
    host: env.HOST || '0.0.0.0',
    corsOrigins: (env.CORS_ORIGIN || '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  };
}
