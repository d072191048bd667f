/**
 * Tools Index - Murabaha Financing Advisor
 *
 * Every tool the advisor agent can call.
 *
 * FILE LOCATIONS:
 * ───────────────────────────────────────────────────────────────────────────
 *   ./calculate-islamic-financing.ts   - One financing quote
 *   ./calculate-multiple-scenarios.ts  - Down payment × tenure comparison
 *   ./get-vehicle-types.ts             - Supported vehicle types and rates
 *   ./done.ts                          - Signal task completion (Pattern 3.2)
 *
 * Calculator (used by the tools):
 *   ../financing/                      - Pure Murabaha calculator
 *   ../data/financing-rules.json       - Rate tables, synonyms, terminology
 * ───────────────────────────────────────────────────────────────────────────
 */

export { calculateIslamicFinancingTool } from './calculate-islamic-financing.js';
export { calculateMultipleScenariosTool } from './calculate-multiple-scenarios.js';
export { getVehicleTypesTool } from './get-vehicle-types.js';
export { doneTool, parseAdvice } from './done.js';
export type { AdviceResult } from './done.js';

import type { Tool } from '../../patterns/types.js';
import { calculateIslamicFinancingTool } from './calculate-islamic-financing.js';
import { calculateMultipleScenariosTool } from './calculate-multiple-scenarios.js';
import { getVehicleTypesTool } from './get-vehicle-types.js';
import { doneTool } from './done.js';

/**
 * All tools available to the financing advisor agent
 */
export const allTools: Tool[] = [
  calculateIslamicFinancingTool,
  calculateMultipleScenariosTool,
  getVehicleTypesTool,
  doneTool,
];

/**
 * Get tools by name
 */
export function getTools(...names: string[]): Tool[] {
  return allTools.filter(t => names.includes(t.name));
}
