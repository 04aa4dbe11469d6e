import { Module } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import { StubInferenceAdapter } from './adapters/stub-inference.adapter';
import { AnthropicInferenceAdapter } from './adapters/anthropic-inference.adapter';
import { OpenAIInferenceAdapter } from './adapters/openai-inference.adapter';
import { INFERENCE_ADAPTER } from './adapters/tokens';
import { InferenceAdapter } from './adapters/inference-adapter.interface';
import { InferenceAdapterOptions } from './types';

/**
 * Build the configured adapter.
 *
 * Transport-level retry (attempt count, timeout) is handed to the SDK here;
 * throttling retries above it belong to InferenceGovernorService.
 *
 * @throws Error when the selected provider has no API key
 */
export function createInferenceAdapter(config: GovernanceConfig): InferenceAdapter {
  const options: InferenceAdapterOptions = {
    model: config.modelId,
    maxTokens: config.modelMaxTokens,
    temperature: config.modelTemperature,
    maxAttempts: config.transportMaxAttempts,
    timeoutMs: config.transportTimeoutMs,
  };

  switch (config.provider) {
    case 'stub':
      return new StubInferenceAdapter();

    case 'anthropic': {
      const apiKey = config.anthropicApiKey;
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY environment variable is required when provider is "anthropic"');
      }
      return new AnthropicInferenceAdapter(apiKey, options);
    }

    case 'openai': {
      const apiKey = config.openaiApiKey;
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY environment variable is required when provider is "openai"');
      }
      return new OpenAIInferenceAdapter(apiKey, options);
    }
  }
}

/**
 * InferenceModule
 *
 * Providers:
 * - INFERENCE_ADAPTER token bound to the provider selected by AI_PROVIDER
 *
 * Requires GovernanceConfig (global).
 */
@Module({
  providers: [
    {
      provide: INFERENCE_ADAPTER,
      useFactory: createInferenceAdapter,
      inject: [GovernanceConfig],
    },
  ],
  exports: [INFERENCE_ADAPTER],
})
export class InferenceModule {}
