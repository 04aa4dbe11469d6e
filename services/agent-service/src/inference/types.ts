/**
 * Inference Contracts
 *
 * Provider-agnostic shapes exchanged between the conversation loop, the
 * inference governor and the provider adapters.
 */

/**
 * ToolCall
 * A model request to run a named tool with JSON arguments
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; results: ToolResult[] };

/**
 * ToolDefinition
 * Tool schema advertised to the model (JSON Schema object for arguments)
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * InferenceRequest
 * Input contract for a single model call
 */
export interface InferenceRequest {
  system?: string;
  messages: ConversationMessage[];
  tools?: ToolDefinition[];
  /** Overrides the adapter default */
  maxTokens?: number;
  /** Overrides the adapter default */
  temperature?: number;
}

export interface InferenceUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * InferenceResult
 * Output contract for a single model call
 *
 * degraded: true when governance gave up on a throttled call and
 * synthesized a user-facing reply instead of a real model response
 */
export interface InferenceResult {
  output: string;
  toolCalls: ToolCall[];
  usage?: InferenceUsage;
  model: string;
  stopReason?: string;
  degraded?: boolean;
}

/**
 * InferenceAdapterOptions
 * Per-provider settings resolved from GovernanceConfig
 *
 * maxAttempts / timeoutMs configure the SDK's own transport retry layer.
 */
export interface InferenceAdapterOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  maxAttempts?: number;
  timeoutMs?: number;
  baseURL?: string;
}
