import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildDataSourceOptions } from '@versevault/database';
import { validateEnvironment } from './config/env.validation';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnvironment,
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildDataSourceOptions({
          path: configService.get<string>('DATABASE_PATH', 'versevault.db'),
          logging: configService.get<boolean>('DATABASE_LOGGING', false),
          migrationsRun: true,
        }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
  ],
})
export class AppModule {}
