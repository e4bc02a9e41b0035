import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

dotenv.config();

const BUNDLED_CONFIG_DIR = fileURLToPath(new URL('../config/', import.meta.url));

export interface CatalogConfig {
  baseUrl: string;
  email?: string;
  password?: string;
}

export interface AppConfig {
  catalog: CatalogConfig;
  operator?: string;
  ignoreFile: string;
  precheckExemptFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    catalog: {
      baseUrl: env.WEB_MONITORING_DB_URL || 'https://api.monitoring.envirodatagov.org',
      email: env.WEB_MONITORING_DB_EMAIL || undefined,
      password: env.WEB_MONITORING_DB_PASSWORD || undefined,
    },
    operator: env.CRAWL_OPERATOR || undefined,
    ignoreFile: env.SEEDS_IGNORE_FILE || `${BUNDLED_CONFIG_DIR}ignore-urls.json`,
    precheckExemptFile:
      env.SEEDS_PRECHECK_EXEMPT_FILE || `${BUNDLED_CONFIG_DIR}precheck-exemptions.json`,
  };
}
