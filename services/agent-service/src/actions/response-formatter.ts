import { ActionResponse } from './action-response';

export function formatResponse(response: ActionResponse): string {
  return `Tool Response (status: ${response.status}):\n${response.payload}`;
}

/**
 * Render collected responses as the single user message fed back to the model
 */
export function formatToolResults(responses: readonly ActionResponse[]): string {
  return `Tool Results:\n${responses.map(formatResponse).join('\n\n')}`;
}
