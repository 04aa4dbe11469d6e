import { InferenceRequest, InferenceResult } from '../types';

/**
 * InferenceAdapter
 *
 * Abstract interface for model providers.
 *
 * Design:
 * - Provider-agnostic contract
 * - No SDK dependencies at interface level
 * - Adapters translate SDK failures into InferenceProviderException so the
 *   governance layer can classify throttling by provider error code
 */
export interface InferenceAdapter {
  /**
   * Model identifier
   * Examples: 'stub', 'claude-3-5-sonnet-20241022', 'gpt-4o'
   */
  readonly model: string;

  /**
   * Run one model call
   *
   * @throws InferenceProviderException if the provider call fails
   */
  complete(request: InferenceRequest): Promise<InferenceResult>;
}
