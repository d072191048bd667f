/**
 * Shared Agent Types (OpenAI-compatible)
 *
 * The message, tool and client shapes every part of the advisor agrees on.
 * Field names that travel to the chat-completions API (tool_calls,
 * tool_call_id, prompt_tokens, ...) keep the wire spelling.
 */

// =============================================================================
// MESSAGES
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Message {
  role: MessageRole;
  content: string;
  /** Present on assistant messages that request tool executions */
  tool_calls?: ToolCall[];
  /** Present on tool messages; links the result to its call */
  tool_call_id?: string;
}

// =============================================================================
// TOOLS
// =============================================================================

export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameterProperty {
  /** A list of types accepts any of them (e.g. an array or a comma-separated string) */
  type: JsonSchemaType | JsonSchemaType[];
  description?: string;
  enum?: string[];
  items?: { type: JsonSchemaType };
  default?: unknown;
}

export interface ToolParameters {
  type: 'object';
  properties: Record<string, ToolParameterProperty>;
  required: string[];
}

export interface Tool {
  name: string;
  description: string;
  parameters: ToolParameters;
  execute: (args: Record<string, unknown>) => Promise<string>;
}

// =============================================================================
// LLM CLIENT
// =============================================================================

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface LLMResponse {
  content: string;
  toolCalls: ToolCall[];
  /** Termination normally happens through the done tool; see TaskComplete */
  done: boolean;
  result?: string;
  usage?: TokenUsage;
}

export interface LLMClient {
  invoke(messages: Message[], tools: Tool[]): Promise<LLMResponse>;
}
