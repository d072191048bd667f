/**
 * Vehicle Type Catalogue
 *
 * What the calculator recognizes and what each type costs under a rule
 * generation, for agents that need to explain the options before quoting.
 */

import { failureOutcome, resolveProfitRate, roundTo, rulesVersion } from './calculator.js';
import { loadFinancingRules } from './rules.js';
import type { CalculationOptions, FinancingFailure } from './types.js';

/** Down-payment percentage the listed rates are quoted at */
export const SAMPLE_DOWN_PAYMENT_PERCENTAGE = 20;

export interface VehicleTypeInfo {
  description: string;
  exampleVariations: string[];
  profitRatePercentage: number;
  rulesApplied: string;
}

export interface VehicleTypeCatalogue {
  success: true;
  vehicleTypes: Record<string, VehicleTypeInfo>;
  rulesVersion: string;
  timestamp: string;
}

export type VehicleTypeCatalogueOutcome = VehicleTypeCatalogue | FinancingFailure;

/**
 * "land cruiser" -> "Land Cruiser", "lx600" -> "Lx600"
 */
export function titleCase(text: string): string {
  return text.replace(/[a-z]+/gi, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function listVehicleTypes(
  useNewRules = true,
  options: CalculationOptions = {}
): VehicleTypeCatalogueOutcome {
  const { now = () => new Date() } = options;

  try {
    const version = rulesVersion(useNewRules);
    const vehicleTypes: Record<string, VehicleTypeInfo> = {};

    for (const { type, synonyms } of loadFinancingRules().vehicleTypes) {
      const rate = resolveProfitRate(type, SAMPLE_DOWN_PAYMENT_PERCENTAGE, false, useNewRules);
      vehicleTypes[type] = {
        description: titleCase(synonyms[0] ?? type),
        exampleVariations: synonyms.slice(0, 3),
        profitRatePercentage: roundTo(rate * 100, 3),
        rulesApplied: version,
      };
    }

    return {
      success: true,
      vehicleTypes,
      rulesVersion: version,
      timestamp: now().toISOString(),
    };
  } catch (error) {
    return failureOutcome(error, options);
  }
}
