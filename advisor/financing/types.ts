/**
 * Financing Types
 *
 * Shapes shared by the Murabaha calculator, its rule tables and the tools
 * that expose it to the agent.
 */

// =============================================================================
// VEHICLE TYPES & RULE TABLES
// =============================================================================

export const VEHICLE_TYPES = ['standard', 'hybrid', 'land_cruiser', 'lx600', 'lx700'] as const;

export type VehicleType = (typeof VEHICLE_TYPES)[number];

export function isVehicleType(value: unknown): value is VehicleType {
  return VEHICLE_TYPES.some(type => type === value);
}

export const ISLAMIC_TERM_KEYS = [
  'vehicle_value',
  'down_payment',
  'balance_amount',
  'profit_rate',
  'profit_amount',
  'total_financing',
  'monthly_instalment',
  'total_payable',
] as const;

export type IslamicTermKey = (typeof ISLAMIC_TERM_KEYS)[number];

export type IslamicTerms = Readonly<Record<IslamicTermKey, string>>;

export interface VehicleTypeEntry {
  readonly type: VehicleType;
  /** Checked in order; the first entry doubles as the display name */
  readonly synonyms: readonly string[];
}

export interface KeywordFallback {
  readonly type: VehicleType;
  readonly keywords: readonly string[];
}

export interface LegacyProfitRates {
  readonly hybrid: number;
  readonly premiumTypes: readonly VehicleType[];
  /** Premium vehicles below this down-payment percentage take the higher rate */
  readonly premiumDownPaymentThreshold: number;
  readonly premiumLowDownPayment: number;
  readonly default: number;
}

export interface FinancingRules {
  readonly vehicleTypes: readonly VehicleTypeEntry[];
  readonly fallbackKeywords: readonly KeywordFallback[];
  readonly currentProfitRates: Readonly<Record<VehicleType, number>>;
  readonly legacyProfitRates: LegacyProfitRates;
  readonly repeatCustomerMultiplier: number;
  readonly maxTenureMonths: { readonly qatari: number; readonly default: number };
  readonly rulesVersions: { readonly current: string; readonly legacy: string };
  readonly islamicTerms: IslamicTerms;
}

// =============================================================================
// REQUESTS
// =============================================================================

/**
 * Raw tool arguments. Agents send numbers as strings ("65,700 AED"),
 * booleans as "yes", and so on; every field is converted leniently.
 */
export interface FinancingInput {
  vehicleValue?: unknown;
  downPayment?: unknown;
  tenureMonths?: unknown;
  vehicleType?: unknown;
  customerType?: unknown;
  servicesContracts?: unknown;
  comprehensiveInsurance?: unknown;
  useNewRules?: unknown;
  isRepeatCustomer?: unknown;
}

export interface FinancingRequest {
  vehicleValue: number;
  downPayment: number;
  tenureMonths: number;
  vehicleType: VehicleType;
  customerType: string;
  servicesContracts: number;
  comprehensiveInsurance: number;
  useNewRules: boolean;
  isRepeatCustomer: boolean;
}

// =============================================================================
// RESULTS
// =============================================================================

/** Full-precision figures; rounding happens only when a result is presented */
export interface FinancingBreakdown {
  downPaymentPercentage: number;
  balanceAmount: number;
  profitRate: number;
  profitAmount: number;
  totalFinancingAmount: number;
  monthlyInstalment: number;
  totalPayable: number;
  totalAdditionalCosts: number;
  grandTotal: number;
}

export interface FinancialBreakdownSummary {
  vehicleValueAed: number;
  downPaymentAed: number;
  downPaymentPercentage: number;
  balanceAmountAed: number;
  profitRatePercentage: number;
  profitAmountAed: number;
  totalFinancingAmountAed: number;
  monthlyInstalmentAed: number;
  totalPayableAed: number;
}

export interface AdditionalCostsSummary {
  servicesContractsAed: number;
  comprehensiveInsuranceAed: number;
  totalAdditionalCostsAed: number;
  grandTotalAed: number;
}

export interface BusinessRulesApplied {
  maxTenureMonths: number;
  rulesVersion: string;
  repeatCustomerDiscount: 'applied' | 'not_applied';
  vehicleSpecificRates: 'applied';
}

export interface FinancingSuccess {
  success: true;
  calculationTimestamp: string;
  shariahCompliant: true;
  financingModel: 'Murabaha (Cost-Plus)';
  inputParameters: FinancingRequest;
  financialBreakdown: FinancialBreakdownSummary;
  islamicTerminology: IslamicTerms;
  additionalCosts: AdditionalCostsSummary;
  businessRulesApplied: BusinessRulesApplied;
}

export interface FinancingFailure {
  success: false;
  error: string;
  calculationTimestamp: string;
  shariahCompliant: true;
}

export type FinancingOutcome = FinancingSuccess | FinancingFailure;

// =============================================================================
// OPTIONS
// =============================================================================

export type Logger = (message: string) => void;

export interface CalculationOptions {
  /** Clock for the informational timestamps. Defaults to the system clock. */
  now?: () => Date;

  /** Receives warnings about skipped scenarios and unexpected failures. Defaults to console.warn. */
  logger?: Logger;
}
