/**
 * Murabaha Financing Calculator
 *
 * Cost-plus vehicle financing: the bank buys the vehicle and sells it on at
 * a profit fixed when the contract is signed. Profit is flat over the tenure
 * (balance × rate × years), never compounded.
 *
 *   balance        = vehicle value − down payment
 *   profit         = balance × profit rate × tenure / 12
 *   total financed = balance + profit
 *   instalment     = total financed / tenure
 *   total payable  = total financed + down payment
 *
 * EXPORTS:
 *   computeFinancing          - full-precision figures, throws on bad requests
 *   calculateIslamicFinancing - tool-facing envelope, never throws
 */

import { FinancingValidationError, errorMessage } from './errors.js';
import { normalizeVehicleType, toBoolean, toNumber, toText } from './normalize.js';
import { loadFinancingRules } from './rules.js';
import type {
  CalculationOptions,
  FinancingBreakdown,
  FinancingFailure,
  FinancingInput,
  FinancingOutcome,
  FinancingRequest,
  Logger,
  VehicleType,
} from './types.js';

export const DEFAULT_FINANCING_REQUEST: Readonly<FinancingRequest> = Object.freeze({
  vehicleValue: 65700,
  downPayment: 10000,
  tenureMonths: 48,
  vehicleType: 'standard',
  customerType: 'individual',
  servicesContracts: 0,
  comprehensiveInsurance: 0,
  useNewRules: true,
  isRepeatCustomer: false,
});

const UNEXPECTED_FAILURE = 'Calculation error: unexpected failure while computing financing';

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// =============================================================================
// RULES
// =============================================================================

export function maxTenureMonths(customerType: string): number {
  const { maxTenureMonths: caps } = loadFinancingRules();
  return customerType.trim().toLowerCase() === 'qatari' ? caps.qatari : caps.default;
}

export function rulesVersion(useNewRules: boolean): string {
  const { rulesVersions } = loadFinancingRules();
  return useNewRules ? rulesVersions.current : rulesVersions.legacy;
}

/**
 * Throws FinancingValidationError for the first rule the request breaks.
 */
export function validateFinancingRequest(request: FinancingRequest): void {
  const { vehicleValue, downPayment, tenureMonths, customerType } = request;

  if (vehicleValue <= 0) {
    throw new FinancingValidationError('Vehicle value must be positive');
  }
  if (downPayment <= 0) {
    throw new FinancingValidationError('Down payment must be positive');
  }
  if (downPayment >= vehicleValue) {
    throw new FinancingValidationError('Down payment must be less than vehicle value');
  }
  if (tenureMonths <= 0) {
    throw new FinancingValidationError('Tenure must be positive');
  }

  const maxTenure = maxTenureMonths(customerType);
  if (tenureMonths > maxTenure) {
    throw new FinancingValidationError(
      `Maximum tenure for ${customerType} customers is ${maxTenure} months`
    );
  }
}

/**
 * Profit rate as a fraction (0.0575, not 5.75).
 * The repeat-customer discount applies after the rule generation picks a rate.
 */
export function resolveProfitRate(
  vehicleType: VehicleType,
  downPaymentPercentage: number,
  isRepeatCustomer: boolean,
  useNewRules: boolean
): number {
  const rules = loadFinancingRules();
  let baseRate: number;

  if (useNewRules) {
    baseRate = rules.currentProfitRates[vehicleType];
  } else {
    const legacy = rules.legacyProfitRates;
    if (vehicleType === 'hybrid') {
      baseRate = legacy.hybrid;
    } else if (
      legacy.premiumTypes.includes(vehicleType) &&
      downPaymentPercentage < legacy.premiumDownPaymentThreshold
    ) {
      baseRate = legacy.premiumLowDownPayment;
    } else {
      baseRate = legacy.default;
    }
  }

  if (isRepeatCustomer) {
    baseRate = baseRate * rules.repeatCustomerMultiplier;
  }

  return baseRate;
}

// =============================================================================
// CALCULATION
// =============================================================================

/**
 * Apply lenient conversions and defaults to raw tool arguments.
 */
export function normalizeFinancingInput(input: FinancingInput): FinancingRequest {
  const defaults = DEFAULT_FINANCING_REQUEST;

  return {
    vehicleValue: toNumber(input.vehicleValue, defaults.vehicleValue),
    downPayment: toNumber(input.downPayment, defaults.downPayment),
    tenureMonths: Math.trunc(toNumber(input.tenureMonths, defaults.tenureMonths)),
    vehicleType: normalizeVehicleType(input.vehicleType ?? defaults.vehicleType),
    customerType: toText(input.customerType, defaults.customerType),
    servicesContracts: toNumber(input.servicesContracts, defaults.servicesContracts),
    comprehensiveInsurance: toNumber(input.comprehensiveInsurance, defaults.comprehensiveInsurance),
    useNewRules: toBoolean(input.useNewRules, defaults.useNewRules),
    isRepeatCustomer: toBoolean(input.isRepeatCustomer, defaults.isRepeatCustomer),
  };
}

export function computeFinancing(request: FinancingRequest): FinancingBreakdown {
  validateFinancingRequest(request);

  const { vehicleValue, downPayment, tenureMonths } = request;

  const balanceAmount = vehicleValue - downPayment;
  const downPaymentPercentage = (downPayment / vehicleValue) * 100;
  const profitRate = resolveProfitRate(
    request.vehicleType,
    downPaymentPercentage,
    request.isRepeatCustomer,
    request.useNewRules
  );

  const profitAmount = balanceAmount * profitRate * (tenureMonths / 12);
  const totalFinancingAmount = balanceAmount + profitAmount;
  const monthlyInstalment = totalFinancingAmount / tenureMonths;
  const totalPayable = totalFinancingAmount + downPayment;

  const totalAdditionalCosts = request.servicesContracts + request.comprehensiveInsurance;
  const grandTotal = totalPayable + totalAdditionalCosts;

  return {
    downPaymentPercentage,
    balanceAmount,
    profitRate,
    profitAmount,
    totalFinancingAmount,
    monthlyInstalment,
    totalPayable,
    totalAdditionalCosts,
    grandTotal,
  };
}

function describeFailure(error: unknown, logger: Logger): string {
  if (error instanceof FinancingValidationError) {
    return `Calculation error: ${error.message}`;
  }
  logger(`[Financing] Unexpected failure: ${errorMessage(error)}`);
  return UNEXPECTED_FAILURE;
}

export function failureOutcome(error: unknown, options: CalculationOptions = {}): FinancingFailure {
  const { now = () => new Date(), logger = console.warn } = options;
  return {
    success: false,
    error: describeFailure(error, logger),
    calculationTimestamp: now().toISOString(),
    shariahCompliant: true,
  };
}

/**
 * Calculate a Murabaha quote from raw tool arguments.
 *
 * Always returns an envelope: `success: true` with the full breakdown, or
 * `success: false` with a message. Amounts are rounded to 2 decimals and the
 * profit rate percentage to 3, at this point only.
 */
export function calculateIslamicFinancing(
  input: FinancingInput = {},
  options: CalculationOptions = {}
): FinancingOutcome {
  const { now = () => new Date() } = options;

  try {
    const request = normalizeFinancingInput(input);
    const figures = computeFinancing(request);
    const rules = loadFinancingRules();

    return {
      success: true,
      calculationTimestamp: now().toISOString(),
      shariahCompliant: true,
      financingModel: 'Murabaha (Cost-Plus)',
      inputParameters: request,
      financialBreakdown: {
        vehicleValueAed: roundTo(request.vehicleValue, 2),
        downPaymentAed: roundTo(request.downPayment, 2),
        downPaymentPercentage: roundTo(figures.downPaymentPercentage, 2),
        balanceAmountAed: roundTo(figures.balanceAmount, 2),
        profitRatePercentage: roundTo(figures.profitRate * 100, 3),
        profitAmountAed: roundTo(figures.profitAmount, 2),
        totalFinancingAmountAed: roundTo(figures.totalFinancingAmount, 2),
        monthlyInstalmentAed: roundTo(figures.monthlyInstalment, 2),
        totalPayableAed: roundTo(figures.totalPayable, 2),
      },
      islamicTerminology: rules.islamicTerms,
      additionalCosts: {
        servicesContractsAed: roundTo(request.servicesContracts, 2),
        comprehensiveInsuranceAed: roundTo(request.comprehensiveInsurance, 2),
        totalAdditionalCostsAed: roundTo(figures.totalAdditionalCosts, 2),
        grandTotalAed: roundTo(figures.grandTotal, 2),
      },
      businessRulesApplied: {
        maxTenureMonths: maxTenureMonths(request.customerType),
        rulesVersion: rulesVersion(request.useNewRules),
        repeatCustomerDiscount: request.isRepeatCustomer ? 'applied' : 'not_applied',
        vehicleSpecificRates: 'applied',
      },
    };
  } catch (error) {
    return failureOutcome(error, options);
  }
}
