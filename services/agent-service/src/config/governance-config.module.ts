import { Global, Module } from '@nestjs/common';
import { GovernanceConfig } from './governance.config';

/**
 * GovernanceConfigModule
 * Makes GovernanceConfig injectable everywhere (requires the global ConfigModule)
 */
@Global()
@Module({
  providers: [GovernanceConfig],
  exports: [GovernanceConfig],
})
export class GovernanceConfigModule {}
