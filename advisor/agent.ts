/**
 * Financing Advisor - The Loop
 *
 * Pattern 1.1 (observe → act → adjust → repeat) with explicit termination
 * through the done tool (Pattern 3.2) and an event-sourced audit trail
 * (Pattern 4.2).
 */

import type { Message, Tool, LLMClient } from '../patterns/types.js';
import { TaskComplete } from '../patterns/index.js';
import type { EventStore } from './state/index.js';

// =============================================================================
// AGENT OPTIONS
// =============================================================================

export interface AgentOptions {
  /**
   * System prompt that defines the agent's persona and instructions.
   */
  systemPrompt?: string;

  /**
   * Maximum number of loop iterations before forced termination.
   * Default: 15
   */
  maxIterations?: number;

  /**
   * Enable verbose logging of agent activity.
   * Default: true
   */
  verbose?: boolean;

  /**
   * Custom logging function. Defaults to console.log.
   */
  logger?: (message: string) => void;

  /**
   * Event store for the audit trail. When provided, every tool call and
   * result is recorded.
   */
  eventStore?: EventStore;
}

/** Stored tool results are cut to this many characters */
const STORED_RESULT_LENGTH = 500;

/**
 * A tool result counts as failed when it is an error string or a JSON
 * envelope carrying `success: false`.
 */
export function isFailedToolResult(result: string): boolean {
  if (result.startsWith('Error')) return true;
  if (!result.startsWith('{')) return false;

  let parsed: unknown;
  try {
    parsed = JSON.parse(result);
  } catch {
    return false;
  }
  return typeof parsed === 'object' && parsed !== null && 'success' in parsed && parsed.success === false;
}

function preview(result: string): string {
  const text = result.length > 100 ? result.substring(0, 100) + '...' : result;
  return text.split('\n')[0] ?? '';
}

// =============================================================================
// THE LOOP
// =============================================================================

/**
 * Run the advisor until it calls done or runs out of iterations.
 *
 * 1. GENERATE - Query the LLM with current context
 * 2. CHECK - Text-only replies go back into the context
 * 3. EXECUTE - Run any requested tool calls
 * 4. REPEAT - Feed results back, continue until done
 *
 * @returns The done tool's result, or a failure message after maxIterations
 */
export async function agent(
  task: string,
  tools: Tool[],
  llm: LLMClient,
  options: AgentOptions = {}
): Promise<string> {
  const {
    systemPrompt,
    maxIterations = 15,
    verbose = true,
    logger = console.log,
    eventStore,
  } = options;

  const log = (msg: string) => {
    if (verbose) logger(msg);
  };

  const startTime = Date.now();

  if (eventStore) {
    await eventStore.append({
      type: 'agent_started',
      task,
      tools: tools.map((t) => t.name),
    });
  }

  const messages: Message[] = [];

  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }

  messages.push({ role: 'user', content: task });

  log('\n' + '='.repeat(60));
  log('MURABAHA FINANCING ADVISOR');
  log('='.repeat(60));
  log(`Task: ${task}\n`);

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    log(`--- Iteration ${iteration} ---`);

    const response = await llm.invoke(messages, tools);

    if (response.toolCalls.length === 0) {
      if (response.content) {
        messages.push({ role: 'assistant', content: response.content });
        log(`LLM response (no tools): ${response.content.substring(0, 100)}...`);
      }
      continue;
    }

    // The assistant message carrying tool_calls must precede the tool results
    // that answer it, or the API rejects the tool_call_id pairing.
    messages.push({
      role: 'assistant',
      content: response.content || '',
      tool_calls: response.toolCalls,
    });

    for (const call of response.toolCalls) {
      const tool = tools.find((t) => t.name === call.name);
      const toolStartTime = Date.now();

      if (eventStore) {
        await eventStore.append({
          type: 'tool_called',
          toolCallId: call.id,
          tool: call.name,
          arguments: call.arguments,
        });
      }

      if (!tool) {
        const errorMsg = `Error: Unknown tool "${call.name}"`;
        messages.push({
          role: 'tool',
          content: errorMsg,
          tool_call_id: call.id,
        });

        if (eventStore) {
          await eventStore.append({
            type: 'tool_result',
            toolCallId: call.id,
            tool: call.name,
            result: errorMsg,
            success: false,
            durationMs: Date.now() - toolStartTime,
          });
        }

        log(`  ✗ ${call.name}: ${errorMsg}`);
        continue;
      }

      log(`  → ${call.name}(${JSON.stringify(call.arguments)})`);

      try {
        const result = await tool.execute(call.arguments);

        messages.push({
          role: 'tool',
          content: result,
          tool_call_id: call.id,
        });

        if (eventStore) {
          await eventStore.append({
            type: 'tool_result',
            toolCallId: call.id,
            tool: call.name,
            result: result.substring(0, STORED_RESULT_LENGTH),
            success: !isFailedToolResult(result),
            durationMs: Date.now() - toolStartTime,
          });
        }

        log(`  ← ${preview(result)}`);
      } catch (error) {
        if (error instanceof TaskComplete) {
          log('Agent completed task.');

          if (eventStore) {
            await eventStore.append({
              type: 'agent_completed',
              result: error.result,
              success: true,
              totalIterations: iteration,
              totalDurationMs: Date.now() - startTime,
            });
          }

          return error.result;
        }
        throw error;
      }
    }
  }

  const failureResult =
    `Agent reached maximum iterations (${maxIterations}) without completing. ` +
    'Consider increasing maxIterations or simplifying the task.';

  if (eventStore) {
    await eventStore.append({
      type: 'agent_completed',
      result: failureResult,
      success: false,
      totalIterations: maxIterations,
      totalDurationMs: Date.now() - startTime,
    });
  }

  return failureResult;
}

// =============================================================================
// SYSTEM PROMPT
// =============================================================================

export const FINANCING_ADVISOR_PROMPT = `You are a Murabaha Financing Advisor helping customers understand Shariah-compliant vehicle financing in AED.

Your tools:
- calculate_islamic_financing: Quote one financing plan (vehicle value, down payment, tenure, vehicle type)
- calculate_multiple_scenarios: Compare several down payments and tenures side by side
- get_available_vehicle_types: List supported vehicle types and their profit rates
- done: Complete the task with your advice

Rules to keep in mind:
- Murabaha profit is fixed and flat over the tenure; never describe it as interest
- Maximum tenure is 48 months, or 60 months for qatari customers
- The down payment must be positive and below the vehicle value
- Repeat customers get 10% off the profit rate

Process:
1. Understand the customer's vehicle, budget and preferred tenure
2. Check the vehicle type if it is unclear
3. Quote the plan, or compare scenarios when the customer is deciding
4. If a calculation fails, explain the problem and suggest valid values

Always use the done tool when finished, providing:
- summary: the advice for the customer, with the key AED figures
- vehicleType: the canonical vehicle type
- monthlyInstalmentAed: the recommended monthly instalment
- confidence: 0-1 score`;
