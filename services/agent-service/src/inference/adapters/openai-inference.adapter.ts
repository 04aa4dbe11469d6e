import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { InferenceAdapter } from './inference-adapter.interface';
import {
  ConversationMessage,
  InferenceAdapterOptions,
  InferenceRequest,
  InferenceResult,
  ToolCall,
} from '../types';
import {
  InferenceProviderException,
} from '../../errors/inference-provider.exception';
import { errorMessage, isRecord } from '../../common/records';

const PROVIDER = 'openai';

/**
 * OpenAIInferenceAdapter
 *
 * Model adapter backed by OpenAI's Chat Completions API.
 *
 * Responsibilities:
 * - Map conversation history to chat messages (tool results become role "tool")
 * - Advertise tools as function definitions
 * - Parse function-call arguments back into ToolCall records
 * - Translate SDK errors into InferenceProviderException, using the
 *   provider `code` (rate_limit_exceeded, insufficient_quota, ...) or `type`
 */
@Injectable()
export class OpenAIInferenceAdapter implements InferenceAdapter {
  private readonly logger = new Logger(OpenAIInferenceAdapter.name);
  private readonly client: OpenAI;
  private readonly defaultModel = 'gpt-4o';
  private readonly maxTokens: number;
  private readonly temperature: number;

  readonly model: string;

  /**
   * @throws Error if API key is missing
   */
  constructor(
    apiKey: string,
    options?: InferenceAdapterOptions & { organization?: string },
  ) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error('OpenAI API key is required');
    }

    this.model = options?.model ?? this.defaultModel;
    this.maxTokens = options?.maxTokens ?? 4096;
    this.temperature = options?.temperature ?? 0;

    const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);

    this.client = new OpenAI({
      apiKey,
      timeout: options?.timeoutMs,
      baseURL: options?.baseURL,
      organization: options?.organization,
      maxRetries: maxAttempts - 1,
    });

    this.logger.log(
      `OpenAIInferenceAdapter initialized with model: ${this.model} ` +
        `(transport attempts=${maxAttempts})`,
    );
  }

  async complete(request: InferenceRequest): Promise<InferenceResult> {
    this.logger.debug(
      `Executing OpenAI request with ${request.messages.length} messages ` +
        `and ${request.tools?.length ?? 0} tools`,
    );

    try {
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

      if (request.system) {
        messages.push({ role: 'system', content: request.system });
      }

      for (const message of request.messages) {
        messages.push(...this.toMessageParams(message));
      }

      const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
        model: this.model,
        messages,
        max_tokens: request.maxTokens ?? this.maxTokens,
        temperature: request.temperature ?? this.temperature,
      };

      if (request.tools && request.tools.length > 0) {
        params.tools = request.tools.map((tool): OpenAI.Chat.ChatCompletionTool => ({
          type: 'function',
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.inputSchema,
          },
        }));
      }

      const completion = await this.client.chat.completions.create(params);

      return this.transformResponse(completion);
    } catch (error) {
      this.handleError(error);
    }
  }

  private toMessageParams(
    message: ConversationMessage,
  ): OpenAI.Chat.ChatCompletionMessageParam[] {
    switch (message.role) {
      case 'user':
        return [{ role: 'user', content: message.content }];
      case 'assistant': {
        const calls = message.toolCalls ?? [];
        if (calls.length === 0) {
          return [{ role: 'assistant', content: message.content }];
        }
        return [
          {
            role: 'assistant',
            content: message.content || null,
            tool_calls: calls.map(
              (call): OpenAI.Chat.ChatCompletionMessageToolCall => ({
                id: call.id,
                type: 'function',
                function: {
                  name: call.name,
                  arguments: JSON.stringify(call.arguments),
                },
              }),
            ),
          },
        ];
      }
      case 'tool':
        return message.results.map(
          (result): OpenAI.Chat.ChatCompletionToolMessageParam => ({
            role: 'tool',
            tool_call_id: result.toolCallId,
            content: result.isError
              ? `Error: ${result.content}`
              : result.content,
          }),
        );
    }
  }

  /**
   * @throws InferenceProviderException if response is malformed
   */
  private transformResponse(
    completion: OpenAI.Chat.ChatCompletion,
  ): InferenceResult {
    const choice = completion.choices?.[0];
    if (!choice || !choice.message) {
      throw this.malformed('missing choices');
    }

    const usage = completion.usage;
    if (
      !usage ||
      typeof usage.prompt_tokens !== 'number' ||
      typeof usage.completion_tokens !== 'number'
    ) {
      throw this.malformed('missing or invalid usage');
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(
      (call) => ({
        id: call.id,
        name: call.function.name,
        arguments: this.parseArguments(
          call.function.name,
          call.function.arguments,
        ),
      }),
    );

    const output = choice.message.content ?? '';
    if (output.length === 0 && toolCalls.length === 0) {
      throw this.malformed('empty content');
    }

    const model = completion.model || this.model;

    this.logger.debug(
      `OpenAI response: tools=${toolCalls.length}, ` +
        `prompt=${usage.prompt_tokens}, ` +
        `completion=${usage.completion_tokens}, model=${model}`,
    );

    return {
      output,
      toolCalls,
      usage: {
        inputTokens: usage.prompt_tokens,
        outputTokens: usage.completion_tokens,
      },
      model,
      stopReason: choice.finish_reason ?? undefined,
    };
  }

  /**
   * Function arguments arrive as a JSON string; anything that is not a
   * JSON object is passed on as empty arguments and left to tool validation.
   */
  private parseArguments(
    toolName: string,
    raw: string,
  ): Record<string, unknown> {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isRecord(parsed)) {
        return parsed;
      }
    } catch (error) {
      this.logger.warn(
        `Unparseable arguments for tool ${toolName}: ${errorMessage(error)}`,
      );
      return {};
    }
    this.logger.warn(`Arguments for tool ${toolName} are not a JSON object`);
    return {};
  }

  private malformed(detail: string): InferenceProviderException {
    this.logger.error(`OpenAI response malformed: ${detail}`);
    return new InferenceProviderException(
      PROVIDER,
      'malformed_response',
      `Malformed OpenAI response: ${detail}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }

  /**
   * Translate SDK errors into InferenceProviderException
   *
   * Error categories:
   * - 401 → UNAUTHORIZED
   * - 400 → BAD_REQUEST
   * - 429 → SERVICE_UNAVAILABLE (rate_limit_exceeded / insufficient_quota)
   * - 5xx → INTERNAL_SERVER_ERROR
   * - Network/Timeout → SERVICE_UNAVAILABLE
   * - Unknown → INTERNAL_SERVER_ERROR
   */
  private handleError(error: unknown): never {
    if (error instanceof InferenceProviderException) {
      throw error;
    }

    this.logger.error(`OpenAI API error: ${errorMessage(error)}`);

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      throw this.unavailable('timeout', 'OpenAI API timeout');
    }

    if (error instanceof OpenAI.APIConnectionError) {
      throw this.unavailable(
        'connection_error',
        'OpenAI API connection error',
      );
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      const code =
        error.code ??
        error.type ??
        (status === 429 ? 'rate_limit_exceeded' : 'unknown');

      if (status === 401) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Invalid OpenAI API key',
          HttpStatus.UNAUTHORIZED,
          status,
        );
      }

      if (status === 400) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'Invalid request to OpenAI API',
          HttpStatus.BAD_REQUEST,
          status,
        );
      }

      if (status === 429) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'OpenAI API rate limit exceeded',
          HttpStatus.SERVICE_UNAVAILABLE,
          status,
        );
      }

      if (status !== undefined && status >= 500 && status < 600) {
        throw new InferenceProviderException(
          PROVIDER,
          code,
          'OpenAI API server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
          status,
        );
      }

      throw new InferenceProviderException(
        PROVIDER,
        code,
        'OpenAI API error',
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
        throw this.unavailable('timeout', 'OpenAI API timeout');
      }

      if (
        error.message.includes('ECONNREFUSED') ||
        error.message.includes('ENOTFOUND')
      ) {
        throw this.unavailable(
        'connection_error',
        'OpenAI API connection error',
      );
      }
    }

    throw new InferenceProviderException(
      PROVIDER,
      'unknown',
      `Unexpected error during OpenAI API call: ${errorMessage(error)}`,
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
