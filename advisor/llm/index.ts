/**
 * LLM Client Module
 *
 * Exports both real (OpenRouter) and mock clients.
 * Use mock for testing, OpenRouter for production.
 */

export {
  OpenRouterClient,
  createOpenRouterClient,
  convertMessage,
  convertResponse,
  convertTool,
  parseToolArguments,
} from './openrouter-client.js';
export type { OpenRouterConfig } from './openrouter-client.js';
export { MockLLMClient, createMockClient, isScenarioName, SCENARIOS } from './mock-client.js';
export type { MockResponse, MockScenario, ScenarioName } from './mock-client.js';

import type { LLMClient } from '../../patterns/types.js';
import { createOpenRouterClient } from './openrouter-client.js';
import { createMockClient, isScenarioName } from './mock-client.js';

/**
 * Create an LLM client based on environment
 *
 * - USE_MOCK=true: Returns mock client for testing
 * - MOCK_SCENARIO: Selects scenario (singleQuote, comparison)
 * - Otherwise: Returns OpenRouter client (requires OPENROUTER_API_KEY)
 */
export function createClient(
  env: NodeJS.ProcessEnv = process.env,
  logger: (message: string) => void = console.log
): LLMClient {
  if (env.USE_MOCK === 'true') {
    const scenarioName = env.MOCK_SCENARIO || 'singleQuote';
    if (!isScenarioName(scenarioName)) {
      throw new Error(`Unknown MOCK_SCENARIO "${scenarioName}". Use singleQuote or comparison.`);
    }
    logger(`[LLM] Using mock client with scenario: ${scenarioName}`);
    return createMockClient(scenarioName);
  }

  logger('[LLM] Using OpenRouter client');
  return createOpenRouterClient(env);
}
