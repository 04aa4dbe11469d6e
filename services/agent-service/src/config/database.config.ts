import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DailySpend } from '../spend/entities/daily-spend.entity';
import {
  CreateDailySpend1776556800000,
} from '../spend/migrations/1776556800000-CreateDailySpend';
import { GovernanceConfig } from './governance.config';

/**
 * Database configuration for TypeORM
 *
 * - postgres: shared ledger for every process of a stage (deployment)
 * - better-sqlite3: single-host file database (local development)
 *
 * Schema is owned by migrations; synchronize stays off.
 */
export const databaseConfig = (
  governance: GovernanceConfig,
): TypeOrmModuleOptions => {
  const shared = {
    entities: [DailySpend],
    migrations: [CreateDailySpend1776556800000],
    migrationsRun: true,
    synchronize: false,
    logging: governance.optionalString('NODE_ENV') === 'development',
  };

  if (governance.databaseDriver === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database:
        governance.optionalString('SQLITE_PATH') ??
        'database/agent-governance.db',
      ...shared,
    };
  }

  return {
    type: 'postgres',
    host: governance.optionalString('POSTGRES_HOST') ?? 'localhost',
    port: parseInt(governance.optionalString('POSTGRES_PORT') ?? '5432', 10),
    username: governance.optionalString('POSTGRES_USER') ?? 'agent',
    password: governance.optionalString('POSTGRES_PASSWORD'),
    database: governance.optionalString('POSTGRES_DB') ?? 'agent_governance',
    extra: {
      max: 10,
      idleTimeoutMillis: 30000,
    },
    ...shared,
  };
};
