/**
 * Mock LLM Client for Deterministic Testing
 *
 * Returns scripted responses for predictable test scenarios.
 * Useful for:
 * - Unit testing without API calls
 * - Demonstrating the system flow
 * - Debugging tool implementations
 *
 * NOTE: Termination happens via the 'done' tool throwing TaskComplete (Pattern 3.2).
 * The mock client returns 'done' as a regular tool call, and the agent loop
 * catches the TaskComplete exception when the tool executes.
 */

import type { Message, Tool, LLMClient, LLMResponse } from '../../patterns/types.js';

export interface MockResponse {
  toolCalls?: Array<{ name: string; arguments: Record<string, unknown> }>;
  content?: string;
}

export type MockScenario = MockResponse[];

export type ScenarioName = 'singleQuote' | 'comparison';

/**
 * Pre-defined scenarios for testing
 */
export const SCENARIOS: Record<ScenarioName, MockScenario> = {
  /**
   * Single quote scenario
   * 1. Quote a Land Cruiser at 350,000 AED, 100,000 down, 48 months
   * 2. Call done tool with the instalment (throws TaskComplete)
   */
  singleQuote: [
    {
      toolCalls: [
        {
          name: 'calculate_islamic_financing',
          arguments: {
            vehicleValue: 350000,
            downPayment: 100000,
            tenureMonths: 48,
            vehicleType: 'Land Cruiser',
          },
        },
      ],
    },
    {
      toolCalls: [
        {
          name: 'done',
          arguments: {
            result: JSON.stringify({
              summary: 'Land Cruiser at 350,000 AED with 100,000 AED down over 48 months: 6,645.83 AED per month.',
              vehicleType: 'land_cruiser',
              monthlyInstalmentAed: 6645.83,
              confidence: 0.9,
            }),
          },
        },
      ],
    },
  ],

  /**
   * Scenario comparison
   * 1. Look up vehicle types and rates
   * 2. Compare two down payments over two tenures for a hybrid
   * 3. Call done tool with the cheapest instalment
   */
  comparison: [
    {
      content: 'Checking which rate applies to hybrids first.',
      toolCalls: [{ name: 'get_available_vehicle_types', arguments: {} }],
    },
    {
      toolCalls: [
        {
          name: 'calculate_multiple_scenarios',
          arguments: {
            vehicleValue: 189000,
            downPayments: '20000, 40000',
            tenures: [36, 48],
            vehicleType: 'hybrid',
          },
        },
      ],
    },
    {
      toolCalls: [
        {
          name: 'done',
          arguments: {
            result: JSON.stringify({
              summary: 'Lowest instalment is 3,588.42 AED with 40,000 AED down over 48 months.',
              vehicleType: 'hybrid',
              monthlyInstalmentAed: 3588.42,
              confidence: 0.85,
            }),
          },
        },
      ],
    },
  ],
};

export function isScenarioName(name: string): name is ScenarioName {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, name);
}

export class MockLLMClient implements LLMClient {
  private scenario: MockScenario;
  private step: number = 0;
  private callLog: Array<{ messages: Message[]; response: LLMResponse }> = [];

  constructor(scenario: MockScenario = SCENARIOS.singleQuote) {
    this.scenario = scenario;
  }

  async invoke(messages: Message[], _tools: Tool[]): Promise<LLMResponse> {
    const mockResponse = this.scenario[this.step];

    if (!mockResponse) {
      // Scenario exhausted - return a done tool call as fallback
      // This will throw TaskComplete when executed
      return {
        content: '',
        toolCalls: [{
          id: 'mock-fallback-done',
          name: 'done',
          arguments: { result: JSON.stringify({ summary: 'Scenario exhausted', confidence: 0 }) },
        }],
        done: false, // Termination happens via TaskComplete exception
      };
    }

    this.step++;

    const promptTokens = Math.round(messages.reduce((sum, m) => sum + m.content.length / 4, 0));
    const response: LLMResponse = {
      content: mockResponse.content ?? '',
      toolCalls: (mockResponse.toolCalls ?? []).map((tc, i) => ({
        id: `mock-${this.step}-${i}`,
        name: tc.name,
        arguments: tc.arguments,
      })),
      done: false, // Termination happens via TaskComplete exception, not this flag
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: 100,
        total_tokens: promptTokens + 100,
      },
    };

    this.callLog.push({ messages: [...messages], response });
    return response;
  }

  /**
   * Get the log of all LLM calls for debugging
   */
  getCallLog() {
    return this.callLog;
  }

  /**
   * Reset the mock to start over
   */
  reset() {
    this.step = 0;
    this.callLog = [];
  }

  /**
   * Set a new scenario
   */
  setScenario(scenario: MockScenario) {
    this.scenario = scenario;
    this.reset();
  }
}

/**
 * Create a mock client for a named scenario
 */
export function createMockClient(scenarioName: ScenarioName = 'singleQuote'): MockLLMClient {
  return new MockLLMClient(SCENARIOS[scenarioName]);
}
