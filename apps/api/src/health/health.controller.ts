import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';

/** A SQLite ping that takes longer than this means the file is locked or gone. */
const SQLITE_PING_TIMEOUT_MS = 1500;

/** GET /health, outside the `/api` prefix. Reports the account database as `database`. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly checks: HealthCheckService,
    private readonly accountsDb: TypeOrmHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  status(): Promise<HealthCheckResult> {
    return this.checks.check([
      () => this.accountsDb.pingCheck('database', { timeout: SQLITE_PING_TIMEOUT_MS }),
    ]);
  }
}
