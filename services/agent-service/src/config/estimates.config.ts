/**
 * Token Estimates
 * Conservative figures used for the optimistic spend reservation made
 * before each model call. The reservation is replaced by actual usage
 * once the call completes.
 */

/**
 * Estimated output tokens for a single model call
 *
 * Estimate: 2,000 tokens
 * - Typical reply: 300-800 tokens
 * - Tool-calling reply with arguments: up to ~1,500 tokens
 * - Remainder is safety buffer
 */
export const ESTIMATED_OUTPUT_TOKENS_PER_CALL = 2000;

/**
 * Input tokens estimated per whitespace-separated word of conversation text
 */
export const ESTIMATED_INPUT_TOKENS_PER_WORD = 1.5;

/**
 * Estimate input tokens for the text that will be sent to the model
 */
export function estimateInputTokens(texts: readonly string[]): number {
  const words = texts.reduce(
    (count, text) =>
      count + text.split(/\s+/).filter((word) => word.length > 0).length,
    0,
  );
  return Math.ceil(words * ESTIMATED_INPUT_TOKENS_PER_WORD);
}
