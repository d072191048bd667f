/**
 * OpenRouter LLM Client
 *
 * Uses the OpenAI SDK with OpenRouter's API endpoint.
 * OpenRouter provides access to multiple models through a single API.
 */

import OpenAI from 'openai';
import type { Message, Tool, LLMClient, LLMResponse, ToolCall } from '../../patterns/types.js';

export interface OpenRouterConfig {
  apiKey: string;
  model?: string;
  siteUrl?: string;
  siteName?: string;
}

export const DEFAULT_MODEL = 'anthropic/claude-sonnet-4';

export class OpenRouterClient implements LLMClient {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenRouterConfig) {
    const defaultHeaders: Record<string, string> = {
      'X-Title': config.siteName ?? 'Murabaha Financing Advisor',
    };
    if (config.siteUrl) {
      defaultHeaders['HTTP-Referer'] = config.siteUrl;
    }

    this.client = new OpenAI({
      baseURL: 'https://openrouter.ai/api/v1',
      apiKey: config.apiKey,
      defaultHeaders,
    });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async invoke(messages: Message[], tools: Tool[]): Promise<LLMResponse> {
    // Convert our Message format to OpenAI format
    const openaiMessages = messages.map(msg => convertMessage(msg));

    // Convert our Tool format to OpenAI format
    const openaiTools = tools.map(tool => convertTool(tool));

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: openaiMessages,
      tools: openaiTools.length > 0 ? openaiTools : undefined,
    });

    return convertResponse(response);
  }
}

export function convertMessage(msg: Message): OpenAI.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'tool':
      return {
        role: 'tool',
        content: msg.content,
        tool_call_id: msg.tool_call_id ?? '',
      };

    case 'assistant':
      // Include tool_calls if present
      if (msg.tool_calls && msg.tool_calls.length > 0) {
        return {
          role: 'assistant',
          content: msg.content || null,
          tool_calls: msg.tool_calls.map(tc => ({
            id: tc.id,
            type: 'function' as const,
            function: {
              name: tc.name,
              arguments: JSON.stringify(tc.arguments),
            },
          })),
        };
      }
      return { role: 'assistant', content: msg.content };

    case 'system':
      return { role: 'system', content: msg.content };

    case 'user':
      return { role: 'user', content: msg.content };
  }
}

export function convertTool(tool: Tool): OpenAI.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  };
}

/**
 * Tool arguments arrive as a JSON string. Anything that is not a JSON object
 * becomes empty arguments; the tools fall back to their defaults.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

export function convertResponse(response: OpenAI.ChatCompletion): LLMResponse {
  const choice = response.choices[0];
  if (!choice) {
    throw new Error('OpenRouter returned no choices');
  }
  const message = choice.message;

  // Extract tool calls - pass through all of them including 'done'
  // The done tool will throw TaskComplete when executed (Pattern 3.2)
  const toolCalls: ToolCall[] = (message.tool_calls ?? []).map(tc => ({
    id: tc.id,
    name: tc.function.name,
    arguments: parseToolArguments(tc.function.arguments),
  }));

  return {
    content: message.content ?? '',
    toolCalls,
    done: false, // Termination happens via TaskComplete exception, not this flag
    usage: response.usage ? {
      prompt_tokens: response.usage.prompt_tokens,
      completion_tokens: response.usage.completion_tokens,
      total_tokens: response.usage.total_tokens,
    } : undefined,
  };
}

/**
 * Create an OpenRouter client from environment variables
 */
export function createOpenRouterClient(env: NodeJS.ProcessEnv = process.env): OpenRouterClient {
  const apiKey = env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new Error(
      'OPENROUTER_API_KEY not set. Copy .env.local.example to .env.local and add your key.'
    );
  }

  return new OpenRouterClient({
    apiKey,
    model: env.OPENROUTER_MODEL,
    siteUrl: env.OPENROUTER_SITE_URL,
    siteName: env.OPENROUTER_SITE_NAME,
  });
}
