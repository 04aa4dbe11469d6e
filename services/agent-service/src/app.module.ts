import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GovernanceConfigModule } from './config/governance-config.module';
import { GovernanceConfig } from './config/governance.config';
import { databaseConfig } from './config/database.config';
import { GovernanceEventsModule } from './governance/governance-events.module';
import { SpendModule } from './spend/spend.module';
import { AgentModule } from './agent/agent.module';

/**
 * AppModule
 *
 * Root module for the agent service.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    GovernanceConfigModule,
    GovernanceEventsModule,
    TypeOrmModule.forRootAsync({
      useFactory: databaseConfig,
      inject: [GovernanceConfig],
    }),
    SpendModule,
    AgentModule,
  ],
})
export class AppModule {}
