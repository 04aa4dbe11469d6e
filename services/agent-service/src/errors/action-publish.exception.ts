import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * ActionPublishException
 * The message bus rejected an action; the action was never submitted.
 */
export class ActionPublishException extends HttpException {
  constructor(
    public readonly actionId: string,
    public readonly kind: string,
    reason: string,
  ) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'Action Publish Failed',
        message: `Action ${actionId} (${kind}) could not be submitted: ${reason}`,
        actionId,
        kind,
      },
      HttpStatus.BAD_GATEWAY,
    );
  }
}
