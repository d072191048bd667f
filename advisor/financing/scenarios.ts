/**
 * Multi-Scenario Comparison
 *
 * Runs the calculator for every down payment × tenure pair so a customer can
 * see the trade-off at a glance. Pairs the rules reject are left out.
 */

import {
  DEFAULT_FINANCING_REQUEST,
  computeFinancing,
  failureOutcome,
  normalizeFinancingInput,
  roundTo,
} from './calculator.js';
import { errorMessage } from './errors.js';
import { parseListParameter, toNumber } from './normalize.js';
import type { CalculationOptions, FinancingFailure, FinancingRequest, Logger, VehicleType } from './types.js';

export const DEFAULT_DOWN_PAYMENTS: readonly number[] = [10000, 15000, 20000];
export const DEFAULT_TENURES: readonly number[] = [36, 48, 60];

export interface ScenarioInput {
  vehicleValue?: unknown;
  /** Array, JSON array string or comma-separated string */
  downPayments?: unknown;
  /** Array, JSON array string or comma-separated string */
  tenures?: unknown;
  vehicleType?: unknown;
  customerType?: unknown;
  useNewRules?: unknown;
  isRepeatCustomer?: unknown;
}

export interface FinancingScenario {
  downPaymentAed: number;
  downPaymentPercentage: number;
  tenureMonths: number;
  monthlyInstalmentAed: number;
  totalPayableAed: number;
  profitAmountAed: number;
}

export interface ScenarioComparison {
  success: true;
  scenariosCount: number;
  comparisonParameters: {
    vehicleValue: number;
    vehicleType: VehicleType;
    customerType: string;
  };
  /** Cheapest monthly instalment first */
  scenarios: FinancingScenario[];
  timestamp: string;
}

export type ScenarioComparisonOutcome = ScenarioComparison | FinancingFailure;

function listValues(raw: unknown, defaults: readonly number[], name: string, logger: Logger): string[] {
  const parsed = parseListParameter(raw);
  switch (parsed.kind) {
    case 'values':
      if (parsed.values.length === 0) {
        logger(`[Financing] Empty ${name} list; no scenarios to compare`);
      }
      return parsed.values;
    case 'invalid':
      logger(`[Financing] Ignoring unparseable ${name} ${JSON.stringify(parsed.raw)}; using defaults`);
      return defaults.map(String);
    case 'missing':
      return defaults.map(String);
  }
}

export function compareFinancingScenarios(
  input: ScenarioInput = {},
  options: CalculationOptions = {}
): ScenarioComparisonOutcome {
  const { now = () => new Date(), logger = console.warn } = options;

  try {
    const base = normalizeFinancingInput({
      vehicleValue: input.vehicleValue,
      vehicleType: input.vehicleType,
      customerType: input.customerType,
      useNewRules: input.useNewRules,
      isRepeatCustomer: input.isRepeatCustomer,
    });

    const downPayments = listValues(input.downPayments, DEFAULT_DOWN_PAYMENTS, 'downPayments', logger).map(
      value => toNumber(value, DEFAULT_FINANCING_REQUEST.downPayment)
    );
    const tenures = listValues(input.tenures, DEFAULT_TENURES, 'tenures', logger).map(value =>
      Math.trunc(toNumber(value, DEFAULT_FINANCING_REQUEST.tenureMonths))
    );

    const scenarios: FinancingScenario[] = [];

    for (const downPayment of downPayments) {
      for (const tenureMonths of tenures) {
        const request: FinancingRequest = { ...base, downPayment, tenureMonths };
        try {
          const figures = computeFinancing(request);
          scenarios.push({
            downPaymentAed: downPayment,
            downPaymentPercentage: roundTo(figures.downPaymentPercentage, 2),
            tenureMonths,
            monthlyInstalmentAed: roundTo(figures.monthlyInstalment, 2),
            totalPayableAed: roundTo(figures.totalPayable, 2),
            profitAmountAed: roundTo(figures.profitAmount, 2),
          });
        } catch (error) {
          logger(
            `[Financing] Scenario skipped (downPayment=${downPayment}, tenure=${tenureMonths}): ${errorMessage(error)}`
          );
        }
      }
    }

    scenarios.sort((a, b) => a.monthlyInstalmentAed - b.monthlyInstalmentAed);

    return {
      success: true,
      scenariosCount: scenarios.length,
      comparisonParameters: {
        vehicleValue: base.vehicleValue,
        vehicleType: base.vehicleType,
        customerType: base.customerType,
      },
      scenarios,
      timestamp: now().toISOString(),
    };
  } catch (error) {
    return failureOutcome(error, options);
  }
}
