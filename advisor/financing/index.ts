/**
 * Financing Module
 *
 * The pure Murabaha calculator behind the financing tools.
 */

export {
  DEFAULT_FINANCING_REQUEST,
  calculateIslamicFinancing,
  computeFinancing,
  failureOutcome,
  maxTenureMonths,
  normalizeFinancingInput,
  resolveProfitRate,
  roundTo,
  rulesVersion,
  validateFinancingRequest,
} from './calculator.js';
export { FinancingValidationError, errorMessage } from './errors.js';
export {
  normalizeVehicleType,
  parseListParameter,
  toBoolean,
  toNumber,
  toText,
} from './normalize.js';
export type { ListParameter } from './normalize.js';
export { loadFinancingRules, parseFinancingRules } from './rules.js';
export {
  DEFAULT_DOWN_PAYMENTS,
  DEFAULT_TENURES,
  compareFinancingScenarios,
} from './scenarios.js';
export type {
  FinancingScenario,
  ScenarioComparison,
  ScenarioComparisonOutcome,
  ScenarioInput,
} from './scenarios.js';
export { SAMPLE_DOWN_PAYMENT_PERCENTAGE, listVehicleTypes, titleCase } from './vehicle-types.js';
export type {
  VehicleTypeCatalogue,
  VehicleTypeCatalogueOutcome,
  VehicleTypeInfo,
} from './vehicle-types.js';
export { VEHICLE_TYPES, isVehicleType } from './types.js';
export type {
  CalculationOptions,
  FinancingBreakdown,
  FinancingFailure,
  FinancingInput,
  FinancingOutcome,
  FinancingRequest,
  FinancingRules,
  FinancingSuccess,
  IslamicTerms,
  Logger,
  VehicleType,
} from './types.js';
