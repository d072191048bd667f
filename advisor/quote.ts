/**
 * Quick Quote - Entry Point
 *
 * Prints one Murabaha quote and the vehicle-type catalogue without an LLM.
 *
 * Usage:
 *   npm run quote
 *   npm run quote -- 120000 20000 36 hybrid
 */

import {
  calculateIslamicFinancing,
  listVehicleTypes,
  type FinancingOutcome,
} from './financing/index.js';

function printQuote(outcome: FinancingOutcome): void {
  if (!outcome.success) {
    console.error(outcome.error);
    return;
  }

  const { financialBreakdown: b, additionalCosts, islamicTerminology: terms, inputParameters } = outcome;
  const rows: Array<[string, string]> = [
    [terms.vehicle_value, `${b.vehicleValueAed.toFixed(2)} AED`],
    [terms.down_payment, `${b.downPaymentAed.toFixed(2)} AED (${b.downPaymentPercentage}%)`],
    [terms.balance_amount, `${b.balanceAmountAed.toFixed(2)} AED`],
    [terms.profit_rate, `${b.profitRatePercentage}%`],
    [terms.profit_amount, `${b.profitAmountAed.toFixed(2)} AED`],
    [terms.total_financing, `${b.totalFinancingAmountAed.toFixed(2)} AED`],
    [terms.monthly_instalment, `${b.monthlyInstalmentAed.toFixed(2)} AED x ${inputParameters.tenureMonths}`],
    [terms.total_payable, `${b.totalPayableAed.toFixed(2)} AED`],
  ];

  console.log(`${outcome.financingModel} - ${inputParameters.vehicleType}, ${inputParameters.customerType}`);
  const width = Math.max(...rows.map(([label]) => label.length));
  for (const [label, value] of rows) {
    console.log(`  ${label.padEnd(width)}  ${value}`);
  }
  if (additionalCosts.totalAdditionalCostsAed > 0) {
    console.log(`  Grand total with additional costs: ${additionalCosts.grandTotalAed.toFixed(2)} AED`);
  }
  console.log(`  Rules: ${outcome.businessRulesApplied.rulesVersion}`);
}

function main(): void {
  const [vehicleValue, downPayment, tenureMonths, vehicleType] = process.argv.slice(2);

  const outcome = calculateIslamicFinancing({ vehicleValue, downPayment, tenureMonths, vehicleType });
  printQuote(outcome);

  const catalogue = listVehicleTypes();
  if (catalogue.success) {
    console.log(`\nVehicle types (${catalogue.rulesVersion}):`);
    for (const [type, info] of Object.entries(catalogue.vehicleTypes)) {
      console.log(`  ${type.padEnd(12)} ${info.profitRatePercentage}%  e.g. ${info.exampleVariations.join(', ')}`);
    }
  } else {
    console.error(catalogue.error);
  }

  if (!outcome.success) {
    process.exitCode = 1;
  }
}

main();
