/**
 * Done Tool - Explicit Termination
 *
 * Signals that the advisor has finished. Executing it throws TaskComplete;
 * the agent loop catches that and returns the carried result.
 *
 * The result is a JSON string with:
 *   - summary: the advice given to the customer
 *   - vehicleType: canonical vehicle type the advice is about (optional)
 *   - monthlyInstalmentAed: the instalment being recommended (optional)
 *   - confidence: 0-1 score
 *
 * @see ../../patterns/05-explicit-termination.ts
 */

import type { Tool } from '../../patterns/types.js';
import { TaskComplete } from '../../patterns/index.js';

export const doneTool: Tool = {
  name: 'done',
  description:
    'Signal that the task is complete and provide the final advice. ' +
    'Call this once the customer has the financing figures they asked for. ' +
    'The result should be a JSON object with: summary, and optionally vehicleType, ' +
    'monthlyInstalmentAed and confidence (0-1).',
  parameters: {
    type: 'object',
    properties: {
      result: {
        type: 'string',
        description:
          'Final result as JSON with keys: summary (advice for the customer), vehicleType, ' +
          'monthlyInstalmentAed (number), confidence (0-1)',
      },
    },
    required: ['result'],
  },

  execute: async (args): Promise<string> => {
    const result = typeof args.result === 'string' ? args.result : JSON.stringify(args.result ?? '');
    throw new TaskComplete(result);
  },
};

/**
 * Expected result format from the done tool
 */
export interface AdviceResult {
  summary: string;
  vehicleType?: string;
  monthlyInstalmentAed?: number;
  confidence: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate the result from done tool
 */
export function parseAdvice(
  result: string,
  logger: (message: string) => void = console.warn
): AdviceResult | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(result);
  } catch (error) {
    logger(`Failed to parse advice: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  if (!isRecord(parsed)) {
    logger('Invalid advice format: expected a JSON object');
    return null;
  }

  const { summary, vehicleType, monthlyInstalmentAed, confidence } = parsed;
  if (typeof summary !== 'string' || summary === '') {
    logger('Invalid advice format: missing summary');
    return null;
  }

  return {
    summary,
    vehicleType: typeof vehicleType === 'string' ? vehicleType : undefined,
    monthlyInstalmentAed: typeof monthlyInstalmentAed === 'number' ? monthlyInstalmentAed : undefined,
    confidence: typeof confidence === 'number' ? confidence : 0.5,
  };
}
