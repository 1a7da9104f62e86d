/**
 * TypeORM order store (PostgreSQL, or SQLite in-process)
 */

export { TypeORMOrderStore } from './typeorm-order-store';
export {
  createDataSource,
  createTypeORMConfig,
  createSqliteConfig,
  PostgresConnectionSettings,
} from './typeorm.config';
export * from './entities';
