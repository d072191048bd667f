/**
 * Financing Rule Tables
 *
 * Loads the profit-rate tables, vehicle-type synonyms and terminology from
 * JSON, checks their shape once and freezes them.
 *
 * DATA FILE (loaded by this module):
 *   ../data/financing-rules.json
 *     - vehicleTypes: canonical types with synonyms, in matching priority
 *     - fallbackKeywords: broad keywords tried when no synonym matches
 *     - currentProfitRates / legacyProfitRates: the two rule generations
 *     - repeatCustomerMultiplier, maxTenureMonths, rulesVersions
 *     - islamicTerms: display labels for the result glossary
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import {
  VEHICLE_TYPES,
  isVehicleType,
  type FinancingRules,
  type IslamicTerms,
  type KeywordFallback,
  type LegacyProfitRates,
  type VehicleType,
  type VehicleTypeEntry,
} from './types.js';

// Cache for loaded rules
let financingRules: FinancingRules | null = null;

function getDataPath(filename: string): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', 'data', filename);
}

/**
 * Load the rule tables (read and validated on first use only)
 */
export function loadFinancingRules(): FinancingRules {
  if (!financingRules) {
    const path = getDataPath('financing-rules.json');
    const data = readFileSync(path, 'utf-8');
    financingRules = deepFreeze(parseFinancingRules(JSON.parse(data), path));
  }
  return financingRules;
}

// =============================================================================
// SHAPE CHECKS
// =============================================================================

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(source: string, path: string, expected: string): never {
  throw new Error(`Invalid financing rules (${source}): ${path} must be ${expected}`);
}

function objectAt(obj: JsonObject, key: string, source: string, path: string): JsonObject {
  const value = obj[key];
  if (!isRecord(value)) fail(source, `${path}${key}`, 'an object');
  return value;
}

function rateAt(obj: JsonObject, key: string, source: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    fail(source, `${path}${key}`, 'a non-negative number');
  }
  return value;
}

function stringAt(obj: JsonObject, key: string, source: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) fail(source, `${path}${key}`, 'a non-empty string');
  return value;
}

function stringsAt(obj: JsonObject, key: string, source: string, path: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || value.length === 0) fail(source, `${path}${key}`, 'a non-empty array');
  return value.map((item, i) => {
    if (typeof item !== 'string' || item.length === 0) {
      fail(source, `${path}${key}[${i}]`, 'a non-empty string');
    }
    return item.toLowerCase();
  });
}

function vehicleTypeAt(obj: JsonObject, key: string, source: string, path: string): VehicleType {
  const value = obj[key];
  if (!isVehicleType(value)) fail(source, `${path}${key}`, `one of ${VEHICLE_TYPES.join(', ')}`);
  return value;
}

function entriesAt(obj: JsonObject, key: string, source: string): JsonObject[] {
  const value = obj[key];
  if (!Array.isArray(value)) fail(source, key, 'an array');
  return value.map((item, i) => {
    if (!isRecord(item)) fail(source, `${key}[${i}]`, 'an object');
    return item;
  });
}

/**
 * Validate raw JSON against the rule-table shape.
 * Throws with the offending path on the first problem found.
 */
export function parseFinancingRules(raw: unknown, source = 'inline'): FinancingRules {
  if (!isRecord(raw)) fail(source, '<root>', 'an object');

  const vehicleTypes: VehicleTypeEntry[] = entriesAt(raw, 'vehicleTypes', source).map((entry, i) => ({
    type: vehicleTypeAt(entry, 'type', source, `vehicleTypes[${i}].`),
    synonyms: stringsAt(entry, 'synonyms', source, `vehicleTypes[${i}].`),
  }));

  for (const type of VEHICLE_TYPES) {
    if (vehicleTypes.filter(entry => entry.type === type).length !== 1) {
      fail(source, 'vehicleTypes', `an array listing "${type}" exactly once`);
    }
  }

  const fallbackKeywords: KeywordFallback[] = entriesAt(raw, 'fallbackKeywords', source).map((entry, i) => ({
    type: vehicleTypeAt(entry, 'type', source, `fallbackKeywords[${i}].`),
    keywords: stringsAt(entry, 'keywords', source, `fallbackKeywords[${i}].`),
  }));

  const current = objectAt(raw, 'currentProfitRates', source, '');
  const currentPath = 'currentProfitRates.';
  const currentProfitRates: Record<VehicleType, number> = {
    standard: rateAt(current, 'standard', source, currentPath),
    hybrid: rateAt(current, 'hybrid', source, currentPath),
    land_cruiser: rateAt(current, 'land_cruiser', source, currentPath),
    lx600: rateAt(current, 'lx600', source, currentPath),
    lx700: rateAt(current, 'lx700', source, currentPath),
  };

  const legacy = objectAt(raw, 'legacyProfitRates', source, '');
  const legacyPath = 'legacyProfitRates.';
  const premiumTypes = legacy['premiumTypes'];
  if (!Array.isArray(premiumTypes) || !premiumTypes.every(isVehicleType)) {
    fail(source, `${legacyPath}premiumTypes`, 'an array of vehicle types');
  }
  const legacyProfitRates: LegacyProfitRates = {
    hybrid: rateAt(legacy, 'hybrid', source, legacyPath),
    premiumTypes,
    premiumDownPaymentThreshold: rateAt(legacy, 'premiumDownPaymentThreshold', source, legacyPath),
    premiumLowDownPayment: rateAt(legacy, 'premiumLowDownPayment', source, legacyPath),
    default: rateAt(legacy, 'default', source, legacyPath),
  };

  const tenure = objectAt(raw, 'maxTenureMonths', source, '');
  const versions = objectAt(raw, 'rulesVersions', source, '');
  const terms = objectAt(raw, 'islamicTerms', source, '');
  const termsPath = 'islamicTerms.';
  const islamicTerms: IslamicTerms = {
    vehicle_value: stringAt(terms, 'vehicle_value', source, termsPath),
    down_payment: stringAt(terms, 'down_payment', source, termsPath),
    balance_amount: stringAt(terms, 'balance_amount', source, termsPath),
    profit_rate: stringAt(terms, 'profit_rate', source, termsPath),
    profit_amount: stringAt(terms, 'profit_amount', source, termsPath),
    total_financing: stringAt(terms, 'total_financing', source, termsPath),
    monthly_instalment: stringAt(terms, 'monthly_instalment', source, termsPath),
    total_payable: stringAt(terms, 'total_payable', source, termsPath),
  };

  return {
    vehicleTypes,
    fallbackKeywords,
    currentProfitRates,
    legacyProfitRates,
    repeatCustomerMultiplier: rateAt(raw, 'repeatCustomerMultiplier', source, ''),
    maxTenureMonths: {
      qatari: rateAt(tenure, 'qatari', source, 'maxTenureMonths.'),
      default: rateAt(tenure, 'default', source, 'maxTenureMonths.'),
    },
    rulesVersions: {
      current: stringAt(versions, 'current', source, 'rulesVersions.'),
      legacy: stringAt(versions, 'legacy', source, 'rulesVersions.'),
    },
    islamicTerms,
  };
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
