import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ActionRequest } from '../actions/action-envelope';
import { ToolCall, ToolDefinition } from '../inference/types';
import {
  NotificationArgumentsDto,
  WebActionArgumentsDto,
} from './dto/tool-arguments.dto';

export const REQUEST_WEB_ACTION = 'request_web_action';
export const SEND_NOTIFICATION = 'send_notification';

export const AGENT_SYSTEM_PROMPT =
  'You are an assistant that can act on external web services. ' +
  'Use request_web_action to read from or act on a web endpoint; ' +
  'results arrive asynchronously as tool results. ' +
  'Use send_notification to notify the user. Keep replies concise.';

export const AGENT_TOOLS: ToolDefinition[] = [
  {
    name: REQUEST_WEB_ACTION,
    description:
      'Submit an HTTP action to an external endpoint. The action runs ' +
      'asynchronously and its result is returned as a tool result when available.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Endpoint URL' },
        operation: {
          type: 'string',
          description: 'Operation to perform, e.g. "fetch" or "search_tee_times"',
        },
        arguments: { type: 'object', description: 'Operation arguments' },
        secret_name: {
          type: 'string',
          description: 'Name of the stored credentials to authenticate with',
        },
        token_url: {
          type: 'string',
          description: 'OAuth token endpoint for the stored credentials',
        },
      },
      required: ['url', 'operation'],
    },
  },
  {
    name: SEND_NOTIFICATION,
    description: 'Send a push notification to the user. Fire-and-forget.',
    inputSchema: {
      type: 'object',
      properties: {
        message: { type: 'string', description: 'Notification text' },
      },
      required: ['message'],
    },
  },
];

export type ToolCallPlan =
  | { ok: true; request: ActionRequest; awaitsResponse: boolean }
  | { ok: false; error: string };

/**
 * Map a model tool call onto an action request.
 * Unknown tools and invalid arguments come back as error text for the model.
 */
export function planToolCall(call: ToolCall): ToolCallPlan {
  switch (call.name) {
    case REQUEST_WEB_ACTION: {
      const args = plainToInstance(WebActionArgumentsDto, call.arguments);
      const error = validationError(args);
      if (error) {
        return { ok: false, error };
      }
      return {
        ok: true,
        awaitsResponse: true,
        request: {
          kind: 'web_action',
          target: args.url,
          operation: args.operation,
          arguments: args.arguments ?? {},
          authConfig: args.secret_name
            ? {
                type: 'oauth_password',
                secretName: args.secret_name,
                tokenUrl: args.token_url,
              }
            : undefined,
        },
      };
    }

    case SEND_NOTIFICATION: {
      const args = plainToInstance(NotificationArgumentsDto, call.arguments);
      const error = validationError(args);
      if (error) {
        return { ok: false, error };
      }
      return {
        ok: true,
        awaitsResponse: false,
        request: { kind: 'notify', arguments: { message: args.message } },
      };
    }

    default:
      return { ok: false, error: `Unknown tool: ${call.name}` };
  }
}

function validationError(target: object): string | undefined {
  const errors = validateSync(target);
  if (errors.length === 0) {
    return undefined;
  }
  const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
  return `Invalid arguments: ${details.join('; ')}`;
}
