import { DataSource, DataSourceOptions } from 'typeorm';
import { ORDER_ENTITIES } from './entities';

export interface PostgresConnectionSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize?: boolean;
  logging?: boolean;
  poolSize?: number;
}

/**
 * TypeORM configuration for PostgreSQL
 */
export const createTypeORMConfig = (
  settings: PostgresConnectionSettings,
): DataSourceOptions => ({
  type: 'postgres',
  host: settings.host,
  port: settings.port,
  username: settings.username,
  password: settings.password,
  database: settings.database,
  entities: ORDER_ENTITIES,
  synchronize: settings.synchronize ?? false,
  logging: settings.logging ?? false,
  // Connection pool settings
  extra: {
    max: settings.poolSize ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },
});

/**
 * In-process SQLite database with the same entities, for tests and local runs
 */
export const createSqliteConfig = (database = ':memory:'): DataSourceOptions => ({
  type: 'better-sqlite3',
  database,
  entities: ORDER_ENTITIES,
  synchronize: true,
});

/**
 * Create and initialize a TypeORM DataSource
 */
export const createDataSource = async (options: DataSourceOptions): Promise<DataSource> => {
  const dataSource = new DataSource(options);
  await dataSource.initialize();
  return dataSource;
};
