/**
 * Calculate Multiple Scenarios Tool
 *
 * Compares every down payment × tenure combination for one vehicle,
 * cheapest monthly instalment first.
 *
 * @see ../financing/scenarios.ts for the comparison
 */

import type { Tool } from '../../patterns/types.js';
import { compareFinancingScenarios, errorMessage } from '../financing/index.js';

export const calculateMultipleScenariosTool: Tool = {
  name: 'calculate_multiple_scenarios',
  description:
    'Calculate several Murabaha financing scenarios side by side for one vehicle. ' +
    'Use this when the customer is unsure about the down payment or the tenure. ' +
    'Combinations that break the financing rules are left out.',
  parameters: {
    type: 'object',
    properties: {
      vehicleValue: {
        type: 'number',
        description: 'Vehicle value in AED. Default 65700.',
      },
      downPayments: {
        type: ['array', 'string'],
        description: 'Down payments to compare in AED, e.g. [10000, 15000, 20000] or "10000, 15000". ' +
          'Commas separate entries, so amounts in a string must not contain thousands separators.',
        items: { type: 'number' },
      },
      tenures: {
        type: ['array', 'string'],
        description: 'Tenures to compare in months, e.g. [36, 48, 60] or "36, 48". An empty list compares nothing.',
        items: { type: 'integer' },
      },
      vehicleType: {
        type: 'string',
        description: 'Vehicle type, e.g. "standard", "hybrid", "Land Cruiser", "LX600", "LX700".',
      },
      customerType: {
        type: 'string',
        description: 'Customer type: "individual" or "qatari".',
        enum: ['individual', 'qatari'],
      },
      useNewRules: {
        type: 'boolean',
        description: 'Use the current rate table (true, default) or the legacy one (false).',
      },
      isRepeatCustomer: {
        type: 'boolean',
        description: 'Apply the repeat-customer discount.',
      },
    },
    required: [],
  },

  execute: async (args): Promise<string> => {
    try {
      const comparison = compareFinancingScenarios({
        vehicleValue: args.vehicleValue,
        downPayments: args.downPayments,
        tenures: args.tenures,
        vehicleType: args.vehicleType,
        customerType: args.customerType,
        useNewRules: args.useNewRules,
        isRepeatCustomer: args.isRepeatCustomer,
      });
      return JSON.stringify(comparison, null, 2);
    } catch (error) {
      return `Error comparing scenarios: ${errorMessage(error)}`;
    }
  },
};
