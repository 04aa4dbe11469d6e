import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * InferenceProviderException
 *
 * Normalized failure of a model provider call. Adapters translate SDK
 * errors into this type so governance can classify them by `code`
 * without knowing which SDK produced them.
 *
 * code: provider error code (e.g. "rate_limit_error", "rate_limit_exceeded",
 *       "authentication_error", "timeout"); "unknown" when none is available
 * providerStatus: HTTP status reported by the provider, if any
 */
export class InferenceProviderException extends HttpException {
  constructor(
    public readonly provider: string,
    public readonly code: string,
    message: string,
    status: HttpStatus,
    public readonly providerStatus?: number,
  ) {
    super(
      {
        statusCode: status,
        error: 'Inference Provider Error',
        message,
        provider,
        code,
      },
      status,
    );
  }
}
