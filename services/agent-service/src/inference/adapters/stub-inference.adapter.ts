import { Injectable, Logger } from '@nestjs/common';
import { InferenceAdapter } from './inference-adapter.interface';
import { InferenceRequest, InferenceResult } from '../types';

/**
 * StubInferenceAdapter
 *
 * Deterministic adapter for running the service without a provider.
 *
 * Behavior:
 * - Echoes the latest user message
 * - Never requests tools
 * - Zero tokens reported
 */
@Injectable()
export class StubInferenceAdapter implements InferenceAdapter {
  private readonly logger = new Logger(StubInferenceAdapter.name);

  readonly model = 'stub';

  async complete(request: InferenceRequest): Promise<InferenceResult> {
    const lastUser = [...request.messages]
      .reverse()
      .find((message) => message.role === 'user');
    const prompt = lastUser && lastUser.role === 'user' ? lastUser.content : '';

    this.logger.debug(
      `StubInferenceAdapter.complete() called with ${request.messages.length} messages`,
    );

    return {
      output: `[STUB] ${prompt}`.trim(),
      toolCalls: [],
      usage: { inputTokens: 0, outputTokens: 0 },
      model: this.model,
      stopReason: 'end_turn',
    };
  }
}
