import { describe, it, expect, vi } from 'vitest';
import { compareFinancingScenarios, type ScenarioComparison, type ScenarioComparisonOutcome } from './scenarios.js';

const FIXED_NOW = () => new Date('2026-03-01T08:00:00.000Z');

function expectComparison(outcome: ScenarioComparisonOutcome): ScenarioComparison {
  if (!outcome.success) {
    throw new Error(`expected success, got: ${outcome.error}`);
  }
  return outcome;
}

describe('compareFinancingScenarios - defaults', () => {
  const logger = vi.fn();
  const result = expectComparison(compareFinancingScenarios({}, { now: FIXED_NOW, logger }));

  it('skips the 60-month pairs an individual cannot take', () => {
    expect(result.scenariosCount).toBe(6);
    expect(result.scenarios).toHaveLength(6);
    expect(result.scenarios.every(s => s.tenureMonths !== 60)).toBe(true);
  });

  it('logs each skipped pair', () => {
    expect(logger).toHaveBeenCalledTimes(3);
    expect(logger).toHaveBeenCalledWith(
      '[Financing] Scenario skipped (downPayment=10000, tenure=60): Maximum tenure for individual customers is 48 months'
    );
  });

  it('sorts by monthly instalment, cheapest first', () => {
    expect(result.scenarios.map(s => [s.downPaymentAed, s.tenureMonths])).toEqual([
      [20000, 48],
      [15000, 48],
      [10000, 48],
      [20000, 36],
      [15000, 36],
      [10000, 36],
    ]);
    const instalments = result.scenarios.map(s => s.monthlyInstalmentAed);
    expect(instalments).toEqual([...instalments].sort((a, b) => a - b));
  });

  it('carries the rounded figures for each pair', () => {
    expect(result.scenarios[0]).toEqual({
      downPaymentAed: 20000,
      downPaymentPercentage: 30.44,
      tenureMonths: 48,
      monthlyInstalmentAed: 1171.06,
      totalPayableAed: 76211,
      profitAmountAed: 10511,
    });
    expect(result.scenarios[2]).toEqual({
      downPaymentAed: 10000,
      downPaymentPercentage: 15.22,
      tenureMonths: 48,
      monthlyInstalmentAed: 1427.31,
      totalPayableAed: 78511,
      profitAmountAed: 12811,
    });
  });

  it('echoes the comparison parameters', () => {
    expect(result.comparisonParameters).toEqual({
      vehicleValue: 65700,
      vehicleType: 'standard',
      customerType: 'individual',
    });
    expect(result.timestamp).toBe('2026-03-01T08:00:00.000Z');
  });
});

describe('compareFinancingScenarios - inputs', () => {
  it('keeps every pair for qatari customers', () => {
    const result = expectComparison(compareFinancingScenarios({ customerType: 'qatari' }, { logger: vi.fn() }));
    expect(result.scenariosCount).toBe(9);
    expect(result.scenarios[0]).toMatchObject({ downPaymentAed: 20000, tenureMonths: 60 });
  });

  it('accepts comma-separated and JSON list strings', () => {
    const logger = vi.fn();
    const result = expectComparison(
      compareFinancingScenarios(
        { vehicleValue: 65700, downPayments: '10000, 70000', tenures: '[36, 48]' },
        { logger }
      )
    );
    // 70,000 is above the vehicle value for both tenures
    expect(result.scenariosCount).toBe(2);
    expect(logger).toHaveBeenCalledTimes(2);
    expect(result.scenarios.map(s => s.tenureMonths)).toEqual([48, 36]);
  });

  it('falls back to the default list for unparseable input', () => {
    const logger = vi.fn();
    const result = expectComparison(
      compareFinancingScenarios({ downPayments: { amount: 5 }, tenures: [48] }, { logger })
    );
    expect(logger).toHaveBeenCalledWith('[Financing] Ignoring unparseable downPayments {"amount":5}; using defaults');
    expect(result.scenarios.map(s => s.downPaymentAed)).toEqual([20000, 15000, 10000]);
  });

  it('normalizes the vehicle type once for every pair', () => {
    const result = expectComparison(
      compareFinancingScenarios({ vehicleType: 'Land Cruiser', downPayments: [10000], tenures: [48] })
    );
    expect(result.comparisonParameters.vehicleType).toBe('land_cruiser');
    // 55,700 × 6.9% × 4 years
    expect(result.scenarios[0]?.profitAmountAed).toBe(15373.2);
  });

  it('returns an empty list when every pair fails', () => {
    const result = expectComparison(
      compareFinancingScenarios({ vehicleValue: 5000, downPayments: [10000], tenures: [12, 24] }, { logger: vi.fn() })
    );
    expect(result.scenariosCount).toBe(0);
    expect(result.scenarios).toEqual([]);
  });

  it('compares nothing when a list is explicitly empty', () => {
    const logger = vi.fn();

    const noDownPayments = expectComparison(compareFinancingScenarios({ downPayments: [], tenures: [36, 48] }, { logger }));
    expect(noDownPayments.scenariosCount).toBe(0);
    expect(noDownPayments.scenarios).toEqual([]);
    expect(logger).toHaveBeenCalledWith('[Financing] Empty downPayments list; no scenarios to compare');

    const noTenures = expectComparison(compareFinancingScenarios({ downPayments: [10000], tenures: '[]' }, { logger }));
    expect(noTenures.scenariosCount).toBe(0);
    expect(logger).toHaveBeenCalledWith('[Financing] Empty tenures list; no scenarios to compare');
  });
});
