import type { DatabaseConfig } from '../utils/config';
import { InvalidOptionError } from '../utils/errors';
import type { SummarySortKey } from '../graph/dependency-resolver';
import type { ConnectionSettings } from '../database/connection';

export interface ConnectionOptions {
  user?: string;
  password?: string;
  host?: string;
  port?: string;
  database?: string;
  verbose?: boolean;
}

export interface SummaryCommandOptions extends ConnectionOptions {
  sort?: string;
}

export interface CascadeCommandOptions extends ConnectionOptions {
  maxDepth?: string;
  timeout?: string;
  outputDir?: string;
  format?: string;
  graph: boolean;
  report: boolean;
  keepSource?: boolean;
}

const SORT_KEYS_BY_FLAG: Record<string, SummarySortKey> = {
  name: 'name',
  dependents: 'dependents',
  'foreign-keys': 'foreignKeys',
};

export function parseNonNegativeInteger(option: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidOptionError(option, value);
  }
  return parseInt(value, 10);
}

export function parsePositiveInteger(option: string, value: string): number {
  const parsed = parseNonNegativeInteger(option, value);
  if (parsed === 0) {
    throw new InvalidOptionError(option, value);
  }
  return parsed;
}

// Node clamps longer timer delays to 1 ms
export const MAX_TIMEOUT_MS = 2147483647;

export function parseTimeout(value: string): number {
  const parsed = parsePositiveInteger('--timeout', value);
  if (parsed > MAX_TIMEOUT_MS) {
    throw new InvalidOptionError('--timeout', value);
  }
  return parsed;
}

export function parseSortKey(value: string): SummarySortKey {
  const key = SORT_KEYS_BY_FLAG[value];
  if (!key) {
    throw new InvalidOptionError('--sort', value);
  }
  return key;
}

/**
 * Merge the command line connection flags over the configured defaults.
 * The password stays unset when neither provides one, so the caller can
 * prompt for it.
 */
export function resolveConnectionSettings(
  options: ConnectionOptions,
  defaults: DatabaseConfig
): ConnectionSettings {
  const explicitFlags =
    options.user !== undefined ||
    options.host !== undefined ||
    options.port !== undefined ||
    options.database !== undefined;

  return {
    host: options.host ?? defaults.host,
    port: options.port !== undefined ? parsePositiveInteger('--port', options.port) : defaults.port,
    database: options.database ?? defaults.database,
    user: options.user ?? defaults.user,
    password: options.password ?? defaults.password,
    // Discrete flags win over a configured connection URL
    url: explicitFlags ? undefined : defaults.url,
  };
}
