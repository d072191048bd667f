/**
 * Agent Patterns
 *
 * The pieces of the agent scaffolding the financing advisor is built on.
 */

// =============================================================================
// Shared Types (OpenAI-compatible)
// =============================================================================
export type {
  Message,
  MessageRole,
  Tool,
  ToolCall,
  ToolParameters,
  ToolParameterProperty,
  JsonSchemaType,
  LLMClient,
  LLMResponse,
  TokenUsage,
} from './types.js';

// =============================================================================
// Tool Patterns
// =============================================================================
export { TaskComplete } from './05-explicit-termination.js';
