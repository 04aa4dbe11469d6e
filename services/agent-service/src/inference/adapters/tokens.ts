/**
 * Dependency Injection Tokens
 */

/**
 * INFERENCE_ADAPTER
 *
 * Injection token for the active InferenceAdapter implementation.
 *
 * Usage:
 * @Inject(INFERENCE_ADAPTER) private readonly adapter: InferenceAdapter
 */
export const INFERENCE_ADAPTER = 'INFERENCE_ADAPTER';
