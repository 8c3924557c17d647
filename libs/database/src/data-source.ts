import { config } from 'dotenv';
import { DataSource } from 'typeorm';
import { join } from 'path';

import { buildDataSourceOptions } from './database.options';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations.
 *
 * Used by:
 * - `typeorm migration:run`: applies pending migrations
 * - `typeorm migration:revert`: reverts the last applied migration
 */
const AppDataSource = new DataSource(
  buildDataSourceOptions({
    path: process.env['DATABASE_PATH'] || 'versevault.db',
    logging: process.env['NODE_ENV'] !== 'production',
    migrationsRun: false,
  }),
);

export default AppDataSource;
