import { ConfigService } from '@nestjs/config';
import { GovernanceConfig } from '../../config/governance.config';

export function buildGovernanceConfig(
  env: Record<string, string> = {},
): GovernanceConfig {
  return new GovernanceConfig(new ConfigService(env));
}
