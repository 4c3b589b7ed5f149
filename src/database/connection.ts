import knex from 'knex';
import type { Knex } from 'knex';
import { createComponentLogger } from '../utils/logger';
import { CatalogUnavailableError } from '../utils/errors';
import type { DatabaseConfig } from '../utils/config';
import { PostgresCatalogGateway } from './services/catalog-gateway';
import type { CatalogGateway } from './services/types';

const logger = createComponentLogger('database');

export type ConnectionSettings = DatabaseConfig;

export interface CatalogConnectionOptions {
  excludedSchemas?: string[];
  // Lets tests hand in a stand-in for the knex factory
  createConnection?: (settings: ConnectionSettings) => Knex;
}

export function createDatabaseConnection(settings: ConnectionSettings): Knex {
  const connection: Knex.PgConnectionConfig | string = settings.url
    ? settings.url
    : {
        host: settings.host,
        port: settings.port,
        database: settings.database,
        user: settings.user,
        password: settings.password,
      };

  // One query at a time, so a single pooled connection is enough
  return knex({
    client: 'pg',
    connection,
    pool: {
      min: 0,
      max: 1,
    },
    acquireConnectionTimeout: 30000,
  });
}

export async function testDatabaseConnection(db: Knex): Promise<void> {
  try {
    await db.raw('SELECT 1');
    logger.debug('Database connection established successfully');
  } catch (error) {
    logger.error('Failed to establish database connection', {
      error: error instanceof Error ? error.message : String(error),
    });
    throw new CatalogUnavailableError('connect', error);
  }
}

/**
 * Open a catalog connection, run `work` against a gateway bound to it, and
 * release the connection on every exit path.
 */
export async function withCatalogConnection<T>(
  settings: ConnectionSettings,
  work: (gateway: CatalogGateway) => Promise<T>,
  options: CatalogConnectionOptions = {}
): Promise<T> {
  const factory = options.createConnection ?? createDatabaseConnection;
  const db = factory(settings);

  try {
    await testDatabaseConnection(db);
    const gateway = new PostgresCatalogGateway(db, { excludedSchemas: options.excludedSchemas });
    return await work(gateway);
  } finally {
    logger.debug('Closing database connection');
    await db.destroy();
  }
}
