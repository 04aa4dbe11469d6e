import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * RateLimitTimeoutException
 * The local token bucket stayed empty for longer than the caller was
 * willing to wait. Retryable: the service is busy, not broken.
 */
export class RateLimitTimeoutException extends HttpException {
  constructor(public readonly waitedMs: number) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'Too Busy',
        message: `Rate limit timeout: no capacity for a model call within ${waitedMs}ms. Please retry shortly.`,
        retryable: true,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
