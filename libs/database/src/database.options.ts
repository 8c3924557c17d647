import { DataSourceOptions } from 'typeorm';

import { User } from './entities/user.entity';
import { CreateUsers1760860800000 } from './migrations/1760860800000-CreateUsers';

export interface DatabaseSettings {
  /** Path of the SQLite file, or ":memory:" for a throwaway database */
  path: string;
  logging: boolean;
  /** Apply pending migrations when the connection opens */
  migrationsRun: boolean;
}

/**
 * Builds the TypeORM options shared by the API (via TypeOrmModule) and the
 * migration CLI. Migrations are listed by class so they run the same way
 * from TypeScript sources and from the compiled output.
 */
export function buildDataSourceOptions(
  settings: DatabaseSettings,
): DataSourceOptions {
  return {
    type: 'better-sqlite3',
    database: settings.path,
    entities: [User],
    migrations: [CreateUsers1760860800000],
    migrationsRun: settings.migrationsRun,
    synchronize: false,
    logging: settings.logging,
  };
}
