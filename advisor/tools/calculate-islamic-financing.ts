/**
 * Calculate Islamic Financing Tool
 *
 * One Murabaha quote for a vehicle: balance, profit, instalment and totals.
 * Returns the calculator's envelope as JSON; validation problems come back
 * as `success: false` so the agent can ask the customer to adjust.
 *
 * @see ../financing/calculator.ts for the calculation
 */

import type { Tool } from '../../patterns/types.js';
import { calculateIslamicFinancing, errorMessage } from '../financing/index.js';

export const calculateIslamicFinancingTool: Tool = {
  name: 'calculate_islamic_financing',
  description:
    'Calculate Shariah-compliant vehicle financing using Murabaha (cost-plus) principles. ' +
    'Returns the balance, profit amount, monthly instalment and total payable in AED. ' +
    'Supports standard, hybrid, Land Cruiser, LX600 and LX700 vehicles.',
  parameters: {
    type: 'object',
    properties: {
      vehicleValue: {
        type: 'number',
        description: 'Vehicle value (Al-Silm) in AED. Default 65700.',
      },
      downPayment: {
        type: 'number',
        description: 'Down payment (Al-Masrof) in AED; must be below the vehicle value. Default 10000.',
      },
      tenureMonths: {
        type: 'integer',
        description: 'Tenure in months. Maximum 48, or 60 for qatari customers. Default 48.',
      },
      vehicleType: {
        type: 'string',
        description: 'Vehicle type, e.g. "standard", "hybrid", "Land Cruiser", "LX600", "LX700".',
      },
      customerType: {
        type: 'string',
        description: 'Customer type: "individual" or "qatari" (affects maximum tenure).',
        enum: ['individual', 'qatari'],
      },
      servicesContracts: {
        type: 'number',
        description: 'Optional services contracts / Takaful amount in AED.',
      },
      comprehensiveInsurance: {
        type: 'number',
        description: 'Optional comprehensive insurance amount in AED.',
      },
      useNewRules: {
        type: 'boolean',
        description: 'Use the current rate table (true, default) or the legacy one (false).',
      },
      isRepeatCustomer: {
        type: 'boolean',
        description: 'Repeat financing customers get 10% off the profit rate.',
      },
    },
    required: [],
  },

  execute: async (args): Promise<string> => {
    try {
      const outcome = calculateIslamicFinancing({
        vehicleValue: args.vehicleValue,
        downPayment: args.downPayment,
        tenureMonths: args.tenureMonths,
        vehicleType: args.vehicleType,
        customerType: args.customerType,
        servicesContracts: args.servicesContracts,
        comprehensiveInsurance: args.comprehensiveInsurance,
        useNewRules: args.useNewRules,
        isRepeatCustomer: args.isRepeatCustomer,
      });
      return JSON.stringify(outcome, null, 2);
    } catch (error) {
      return `Error calculating financing: ${errorMessage(error)}`;
    }
  },
};
