// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Errors ──────────────────────────────────────────────────
export { isUniqueViolation } from './errors/unique-violation';

// ── Connection ──────────────────────────────────────────────
export { buildDataSourceOptions } from './database.options';
export type { DatabaseSettings } from './database.options';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
