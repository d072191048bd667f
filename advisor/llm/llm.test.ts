import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import {
  MockLLMClient,
  OpenRouterClient,
  SCENARIOS,
  convertMessage,
  convertResponse,
  convertTool,
  createClient,
  isScenarioName,
  parseToolArguments,
} from './index.js';
import { doneTool } from '../tools/index.js';

describe('parseToolArguments', () => {
  it('parses JSON objects', () => {
    expect(parseToolArguments('{"vehicleValue": 120000, "vehicleType": "hybrid"}')).toEqual({
      vehicleValue: 120000,
      vehicleType: 'hybrid',
    });
  });

  it('falls back to empty arguments', () => {
    expect(parseToolArguments('')).toEqual({});
    expect(parseToolArguments('{"vehicleValue":')).toEqual({});
    expect(parseToolArguments('[1, 2]')).toEqual({});
    expect(parseToolArguments('null')).toEqual({});
  });
});

describe('convertMessage', () => {
  it('serializes tool call arguments on assistant messages', () => {
    expect(
      convertMessage({
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'call-1', name: 'done', arguments: { result: '{}' } }],
      })
    ).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call-1', type: 'function', function: { name: 'done', arguments: '{"result":"{}"}' } }],
    });
  });

  it('pairs tool results with their call id', () => {
    expect(convertMessage({ role: 'tool', content: 'ok', tool_call_id: 'call-1' })).toEqual({
      role: 'tool',
      content: 'ok',
      tool_call_id: 'call-1',
    });
  });

  it('passes plain messages through', () => {
    expect(convertMessage({ role: 'user', content: 'Quote a hybrid' })).toEqual({
      role: 'user',
      content: 'Quote a hybrid',
    });
    expect(convertMessage({ role: 'assistant', content: 'Sure.' })).toEqual({ role: 'assistant', content: 'Sure.' });
  });
});

describe('convertTool', () => {
  it('wraps a tool as a function definition', () => {
    expect(convertTool(doneTool)).toEqual({
      type: 'function',
      function: {
        name: 'done',
        description: doneTool.description,
        parameters: doneTool.parameters,
      },
    });
  });
});

describe('convertResponse', () => {
  const completion = (message: OpenAI.ChatCompletionMessage): OpenAI.ChatCompletion => ({
    id: 'cmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, finish_reason: 'tool_calls', logprobs: null, message }],
    usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
  });

  it('extracts tool calls and usage', () => {
    const response = convertResponse(
      completion({
        role: 'assistant',
        content: null,
        refusal: null,
        tool_calls: [
          {
            id: 'call-1',
            type: 'function',
            function: { name: 'calculate_islamic_financing', arguments: '{"vehicleValue":90000}' },
          },
        ],
      })
    );

    expect(response).toEqual({
      content: '',
      toolCalls: [{ id: 'call-1', name: 'calculate_islamic_financing', arguments: { vehicleValue: 90000 } }],
      done: false,
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    });
  });

  it('rejects a completion without choices', () => {
    expect(() => convertResponse({ ...completion({ role: 'assistant', content: 'hi', refusal: null }), choices: [] })).toThrow(
      'OpenRouter returned no choices'
    );
  });
});

describe('MockLLMClient', () => {
  it('replays the scenario with stable call ids', async () => {
    const llm = new MockLLMClient(SCENARIOS.singleQuote);

    const first = await llm.invoke([{ role: 'user', content: 'Quote' }], []);
    expect(first.toolCalls.map(c => [c.id, c.name])).toEqual([['mock-1-0', 'calculate_islamic_financing']]);

    const second = await llm.invoke([], []);
    expect(second.toolCalls.map(c => [c.id, c.name])).toEqual([['mock-2-0', 'done']]);
  });

  it('falls back to done once the scenario is exhausted', async () => {
    const llm = new MockLLMClient([]);
    const response = await llm.invoke([], []);

    expect(response.toolCalls).toEqual([
      {
        id: 'mock-fallback-done',
        name: 'done',
        arguments: { result: '{"summary":"Scenario exhausted","confidence":0}' },
      },
    ]);
  });

  it('starts over after reset', async () => {
    const llm = new MockLLMClient(SCENARIOS.comparison);
    await llm.invoke([], []);
    llm.reset();

    const response = await llm.invoke([], []);
    expect(response.content).toBe('Checking which rate applies to hybrids first.');
    expect(llm.getCallLog()).toHaveLength(1);
  });
});

describe('createClient', () => {
  it('returns the mock client when USE_MOCK is set', () => {
    const logger = vi.fn();
    const client = createClient({ USE_MOCK: 'true', MOCK_SCENARIO: 'comparison' }, logger);

    expect(client).toBeInstanceOf(MockLLMClient);
    expect(logger).toHaveBeenCalledWith('[LLM] Using mock client with scenario: comparison');
  });

  it('rejects unknown mock scenarios', () => {
    expect(() => createClient({ USE_MOCK: 'true', MOCK_SCENARIO: 'auto_loan' }, vi.fn())).toThrow(
      'Unknown MOCK_SCENARIO "auto_loan". Use singleQuote or comparison.'
    );
    expect(isScenarioName('singleQuote')).toBe(true);
    expect(isScenarioName('toString')).toBe(false);
  });

  it('requires an API key for OpenRouter', () => {
    expect(() => createClient({}, vi.fn())).toThrow('OPENROUTER_API_KEY not set');
  });

  it('builds the OpenRouter client from the environment', () => {
    const client = createClient({ OPENROUTER_API_KEY: 'test-key', OPENROUTER_MODEL: 'test/model' }, vi.fn());
    expect(client).toBeInstanceOf(OpenRouterClient);
  });
});
