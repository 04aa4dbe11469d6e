import { Module } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import { Clock, CLOCK, systemClock } from '../common/clock';
import { InferenceModule } from '../inference/inference.module';
import { InferenceGovernorService } from './inference-governor.service';
import { TokenBucket } from './token-bucket';
import { RATE_LIMITER } from './tokens';

/**
 * GovernanceModule
 *
 * Providers:
 * - RATE_LIMITER: TokenBucket sized from RATE_LIMIT_REQUESTS_PER_MINUTE
 * - InferenceGovernorService
 *
 * GovernanceEventsService comes from the global GovernanceEventsModule.
 */
@Module({
  imports: [InferenceModule],
  providers: [
    {
      provide: RATE_LIMITER,
      useFactory: (config: GovernanceConfig, clock?: Clock) =>
        new TokenBucket(config.requestsPerMinute, clock ?? systemClock),
      inject: [GovernanceConfig, { token: CLOCK, optional: true }],
    },
    InferenceGovernorService,
  ],
  exports: [InferenceGovernorService],
})
export class GovernanceModule {}
