import { Global, Module } from '@nestjs/common';
import { GovernanceEventsService } from './governance-events.service';

@Global()
@Module({
  providers: [GovernanceEventsService],
  exports: [GovernanceEventsService],
})
export class GovernanceEventsModule {}
