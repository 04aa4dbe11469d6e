import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { isRecord } from '../common/records';
import { ActionResponseMessageDto } from './dto/action-response-message.dto';

/**
 * ActionResponse
 * A validated executor response, detached from its queue delivery
 */
export interface ActionResponse {
  id: string;
  /** Id of the action this answers, when the executor echoed it */
  correlationId?: string;
  createdBy: string;
  messageType: string;
  status: string;
  /** Payload as text; structured payloads are JSON-encoded */
  payload: string;
  createdDate?: string;
  stage?: string;
}

export type ParsedActionResponse =
  | { ok: true; response: ActionResponse }
  | { ok: false; reason: string };

/**
 * Parse a queue body into an ActionResponse.
 *
 * Accepts the envelope itself or an SNS notification wrapping it
 * ({ "Type": "Notification", "Message": "<envelope JSON>" }).
 */
export function parseActionResponse(body: string): ParsedActionResponse {
  let parsed = parseJson(body);
  if (parsed === undefined) {
    return { ok: false, reason: 'body is not valid JSON' };
  }

  if (
    isRecord(parsed) &&
    parsed.Type === 'Notification' &&
    typeof parsed.Message === 'string'
  ) {
    parsed = parseJson(parsed.Message);
    if (parsed === undefined) {
      return { ok: false, reason: 'notification message is not valid JSON' };
    }
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: 'envelope is not a JSON object' };
  }

  const dto = plainToInstance(ActionResponseMessageDto, parsed);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const reason = errors
      .map(
        (error) =>
          Object.values(error.constraints ?? {}).join(', ') || error.property,
      )
      .join('; ');
    return { ok: false, reason };
  }

  return {
    ok: true,
    response: {
      id: dto.id,
      correlationId: dto.correlation_id,
      createdBy: dto.created_by,
      messageType: dto.message_type,
      status: dto.status ?? 'unknown',
      payload:
        typeof dto.payload === 'string'
          ? dto.payload
          : JSON.stringify(dto.payload),
      createdDate: dto.created_date,
      stage: dto.stage,
    },
  };
}

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
