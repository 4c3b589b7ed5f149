import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  url?: string;
}

export interface CatalogConfig {
  excludedSchemas: string[];
}

export interface GraphConfig {
  outputDir: string;
  format: string;
  dotPath: string;
}

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface Config {
  database: DatabaseConfig;
  catalog: CatalogConfig;
  graph: GraphConfig;
  logging: LoggingConfig;
  nodeEnv: string;
}

type Env = NodeJS.ProcessEnv;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getEnvVarAsList(env: Env, key: string, defaultValue: string[]): string[] {
  const value = env[key];
  if (!value) return defaultValue;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Build the configuration from an environment map. Exposed so the parsing
 * rules can be exercised without touching `process.env`.
 */
export function loadConfig(env: Env = process.env): Config {
  // Both user and database default to the login name, as psql does
  const loginName = env.USER || 'postgres';

  return {
    database: {
      host: getEnvVar(env, 'DATABASE_HOST', 'localhost'),
      port: getEnvVarAsNumber(env, 'DATABASE_PORT', 5432),
      database: getEnvVar(env, 'DATABASE_NAME', loginName),
      user: getEnvVar(env, 'DATABASE_USER', loginName),
      password: env.DATABASE_PASSWORD,
      url: env.DATABASE_URL,
    },
    catalog: {
      excludedSchemas: getEnvVarAsList(env, 'CATALOG_EXCLUDED_SCHEMAS', [
        'pg_catalog',
        'information_schema',
      ]),
    },
    graph: {
      outputDir: getEnvVar(env, 'GRAPH_OUTPUT_DIR', process.cwd()),
      format: getEnvVar(env, 'GRAPH_FORMAT', 'pdf'),
      dotPath: getEnvVar(env, 'GRAPHVIZ_DOT_PATH', 'dot'),
    },
    logging: {
      level: getEnvVar(env, 'LOG_LEVEL', 'info'),
      file: env.LOG_FILE,
    },
    nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
  };
}

export const config: Config = loadConfig();
