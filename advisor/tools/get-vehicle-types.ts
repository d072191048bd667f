/**
 * Get Available Vehicle Types Tool
 *
 * Lists the vehicle types the calculator distinguishes, with the profit rate
 * each one carries under the chosen rule generation.
 */

import type { Tool } from '../../patterns/types.js';
import { errorMessage, listVehicleTypes, toBoolean } from '../financing/index.js';

export const getVehicleTypesTool: Tool = {
  name: 'get_available_vehicle_types',
  description:
    'Get the supported vehicle types and their current profit rates. ' +
    'Use this to explain why a hybrid costs less to finance than a Land Cruiser.',
  parameters: {
    type: 'object',
    properties: {
      useNewRules: {
        type: 'boolean',
        description: 'Show current rates (true, default) or legacy rates (false).',
      },
    },
    required: [],
  },

  execute: async (args): Promise<string> => {
    try {
      return JSON.stringify(listVehicleTypes(toBoolean(args.useNewRules, true)), null, 2);
    } catch (error) {
      return `Error listing vehicle types: ${errorMessage(error)}`;
    }
  },
};
