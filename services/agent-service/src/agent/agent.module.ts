import { Module } from '@nestjs/common';
import { GovernanceModule } from '../governance/governance.module';
import { SpendModule } from '../spend/spend.module';
import { ActionsModule } from '../actions/actions.module';
import { AgentService } from './agent.service';
import { AgentController } from './agent.controller';

/**
 * AgentModule
 * Conversation loop and its HTTP surface
 * (POST /api/agent/chat, GET /api/agent/status)
 */
@Module({
  imports: [GovernanceModule, SpendModule, ActionsModule],
  controllers: [AgentController],
  providers: [AgentService],
})
export class AgentModule {}
