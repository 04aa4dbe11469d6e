import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { InferenceAdapter } from './inference-adapter.interface';
import {
  ConversationMessage,
  InferenceAdapterOptions,
  InferenceRequest,
  InferenceResult,
  ToolCall,
  ToolDefinition,
} from '../types';
import {
  InferenceProviderException,
} from '../../errors/inference-provider.exception';
import { errorMessage, isRecord } from '../../common/records';

type AnthropicBlock =
  | Anthropic.TextBlockParam
  | Anthropic.ToolUseBlockParam
  | Anthropic.ToolResultBlockParam;

const PROVIDER = 'anthropic';

/**
 * AnthropicInferenceAdapter
 *
 * Model adapter backed by Anthropic's Messages API.
 *
 * Responsibilities:
 * - Map conversation history and tool schemas to Messages API format
 * - Configure the SDK's transport retry (maxRetries, timeout)
 * - Map text and tool_use blocks back to InferenceResult
 * - Translate SDK errors into InferenceProviderException with the
 *   provider error type as `code` (rate_limit_error, overloaded_error, ...)
 *
 * Token Accounting:
 * - Usage is returned to the caller; SpendLedgerService tracks spend
 */
@Injectable()
export class AnthropicInferenceAdapter implements InferenceAdapter {
  private readonly logger = new Logger(AnthropicInferenceAdapter.name);
  private readonly client: Anthropic;
  private readonly defaultModel = 'claude-3-5-sonnet-20241022';
  private readonly maxTokens: number;
  private readonly temperature: number;

  readonly model: string;

  /**
   * @throws Error if API key is missing
   */
  constructor(apiKey: string, options?: InferenceAdapterOptions) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error('Anthropic API key is required');
    }

    this.model = options?.model ?? this.defaultModel;
    this.maxTokens = options?.maxTokens ?? 4096;
    this.temperature = options?.temperature ?? 0;

    const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);

    this.client = new Anthropic({
      apiKey,
      timeout: options?.timeoutMs,
      baseURL: options?.baseURL,
      maxRetries: maxAttempts - 1,
    });

    this.logger.log(
      `AnthropicInferenceAdapter initialized with model: ${this.model} ` +
        `(transport attempts=${maxAttempts})`,
    );
  }

  async complete(request: InferenceRequest): Promise<InferenceResult> {
    this.logger.debug(
      `Executing Anthropic request with ${request.messages.length} messages ` +
        `and ${request.tools?.length ?? 0} tools`,
    );

    try {
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: this.model,
        max_tokens: request.maxTokens ?? this.maxTokens,
        temperature: request.temperature ?? this.temperature,
        messages: this.toMessageParams(request.messages),
      };

      if (request.system) {
        params.system = request.system;
      }

      if (request.tools && request.tools.length > 0) {
        params.tools = request.tools.map((tool) => this.toTool(tool));
      }

      const response = await this.client.messages.create(params);

      return this.transformResponse(response);
    } catch (error) {
      this.handleError(error);
    }
  }

  /**
   * Map history to Messages API params.
   * Consecutive messages of the same role are merged, since tool results and
   * follow-up user text both travel as role "user".
   */
  private toMessageParams(
    messages: ConversationMessage[],
  ): Anthropic.MessageParam[] {
    const params: Array<{
      role: 'user' | 'assistant';
      content: AnthropicBlock[];
    }> = [];

    for (const message of messages) {
      const role = message.role === 'assistant' ? 'assistant' : 'user';
      const blocks = this.toBlocks(message);
      if (blocks.length === 0) {
        continue;
      }

      const previous = params[params.length - 1];
      if (previous && previous.role === role) {
        previous.content.push(...blocks);
      } else {
        params.push({ role, content: blocks });
      }
    }

    return params;
  }

  private toBlocks(message: ConversationMessage): AnthropicBlock[] {
    switch (message.role) {
      case 'user':
        return message.content ? [{ type: 'text', text: message.content }] : [];
      case 'assistant': {
        const blocks: AnthropicBlock[] = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          blocks.push({
            type: 'tool_use',
            id: call.id,
            name: call.name,
            input: call.arguments,
          });
        }
        return blocks;
      }
      case 'tool':
        return message.results.map((result): Anthropic.ToolResultBlockParam => ({
          type: 'tool_result',
          tool_use_id: result.toolCallId,
          content: result.content,
          is_error: result.isError ?? false,
        }));
    }
  }

  private toTool(tool: ToolDefinition): Anthropic.Tool {
    return {
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    };
  }

  /**
   * Transform Anthropic response to InferenceResult
   *
   * @throws InferenceProviderException if response is malformed
   */
  private transformResponse(response: Anthropic.Message): InferenceResult {
    if (!response.content) {
      throw this.malformed('missing content');
    }

    if (
      !response.usage ||
      typeof response.usage.input_tokens !== 'number' ||
      typeof response.usage.output_tokens !== 'number' ||
      response.usage.input_tokens < 0 ||
      response.usage.output_tokens < 0
    ) {
      throw this.malformed('missing or invalid usage');
    }

    const texts: string[] = [];
    const toolCalls: ToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        texts.push(block.text);
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: isRecord(block.input) ? block.input : {},
        });
      }
    }

    if (texts.length === 0 && toolCalls.length === 0) {
      throw this.malformed('no text or tool_use content');
    }

    const model = response.model || this.model;

    this.logger.debug(
      `Anthropic response: tools=${toolCalls.length}, ` +
        `input=${response.usage.input_tokens}, ` +
        `output=${response.usage.output_tokens}, model=${model}`,
    );

    return {
      output: texts.join('\n\n'),
      toolCalls,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model,
      stopReason: response.stop_reason ?? undefined,
    };
  }

  private malformed(detail: string): InferenceProviderException {
    this.logger.error(`Anthropic response malformed: ${detail}`);
    return new InferenceProviderException(
      PROVIDER,
      'malformed_response',
      `Malformed Anthropic response: ${detail}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }

  /**
   * Translate SDK errors into InferenceProviderException
   *
   * Error categories:
   * - 401 → UNAUTHORIZED (authentication_error)
   * - 400 → BAD_REQUEST (invalid_request_error)
   * - 429 / 529 → SERVICE_UNAVAILABLE (rate_limit_error / overloaded_error)
   * - 5xx → INTERNAL_SERVER_ERROR (api_error)
   * - Network/Timeout → SERVICE_UNAVAILABLE (connection_error / timeout)
   * - Unknown → INTERNAL_SERVER_ERROR (unknown)
   */
  private handleError(error: unknown): never {
    if (error instanceof InferenceProviderException) {
      throw error;
    }

    this.logger.error(`Anthropic API error: ${errorMessage(error)}`);

    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      throw this.unavailable('timeout', 'Anthropic API timeout');
    }

    if (error instanceof Anthropic.APIConnectionError) {
      throw this.unavailable(
        'connection_error',
        'Anthropic API connection error',
      );
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;
      const code =
        readAnthropicErrorType(error.error) ?? defaultCodeForStatus(status);

      if (status === 401) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Invalid Anthropic API key',
          HttpStatus.UNAUTHORIZED,
          status,
        );
      }

      if (status === 400) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Invalid request to Anthropic API',
          HttpStatus.BAD_REQUEST,
          status,
        );
      }

      if (status === 429 || status === 529 || code === 'overloaded_error') {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Anthropic API rate limit exceeded',
          HttpStatus.SERVICE_UNAVAILABLE,
          status,
        );
      }

      if (status !== undefined && status >= 500 && status < 600) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Anthropic API server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
          status,
        );
      }

      throw new InferenceProviderException(
        PROVIDER,
        code,
        'Anthropic API error',
        HttpStatus.INTERNAL_SERVER_ERROR,
        status,
      );
    }

    if (error instanceof Error) {
      if (
        error.name === 'TimeoutError' ||
        error.message.includes('timeout') ||
        error.message.includes('ETIMEDOUT')
      ) {
        throw this.unavailable('timeout', 'Anthropic API timeout');
      }

      if (
        error.message.includes('ECONNREFUSED') ||
        error.message.includes('ENOTFOUND')
      ) {
        throw this.unavailable(
        'connection_error',
        'Anthropic API connection error',
      );
      }
    }

    throw new InferenceProviderException(
      PROVIDER,
      'unknown',
      `Unexpected error during Anthropic API call: ${errorMessage(error)}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }

  private unavailable(
    code: string,
    message: string,
  ): InferenceProviderException {
    return new InferenceProviderException(
      PROVIDER,
      code,
      message,
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}

/**
 * Anthropic error bodies look like { type: "error", error: { type, message } }
 */
function readAnthropicErrorType(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const inner = body.error;
  if (isRecord(inner) && typeof inner.type === 'string') {
    return inner.type;
  }
  return typeof body.type === 'string' && body.type !== 'error'
    ? body.type
    : undefined;
}

function defaultCodeForStatus(status: number | undefined): string {
  switch (status) {
    case 400:
      return 'invalid_request_error';
    case 401:
      return 'authentication_error';
    case 429:
      return 'rate_limit_error';
    case 529:
      return 'overloaded_error';
    default:
      return status !== undefined && status >= 500 ? 'api_error' : 'unknown';
  }
}
