/**
 * Input Normalization
 *
 * Agents pass arguments loosely: "65,700 AED" for a number, "yes" for a
 * boolean, "10000, 15000" or '["10000","15000"]' for a list. Everything is
 * converted here, once, before the calculator sees it.
 */

import { loadFinancingRules } from './rules.js';
import type { VehicleType } from './types.js';

// =============================================================================
// SCALARS
// =============================================================================

/**
 * Convert a loosely typed value to a finite number.
 * Strings lose thousands separators, "AED" and "$" first.
 * Unparseable values give the fallback rather than an error.
 */
export function toNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }

  if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').replace(/AED/g, '').replace(/\$/g, '').trim();
    if (cleaned === '') return fallback;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  return fallback;
}

const TRUE_WORDS = new Set(['true', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'n', '0']);

export function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return fallback;
}

export function toText(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

// =============================================================================
// LIST PARAMETERS
// =============================================================================

/**
 * A list argument after parsing: nothing was given, a list was given
 * (possibly empty), or something was given that is not a list.
 */
export type ListParameter =
  | { kind: 'missing' }
  | { kind: 'values'; values: string[] }
  | { kind: 'invalid'; raw: unknown };

function listItems(items: unknown[]): ListParameter {
  const values: string[] = [];
  for (const item of items) {
    if (typeof item === 'number' && Number.isFinite(item)) {
      values.push(String(item));
    } else if (typeof item === 'string') {
      if (item.trim() !== '') values.push(item.trim());
    } else {
      return { kind: 'invalid', raw: items };
    }
  }
  return { kind: 'values', values };
}

/**
 * Parse a list argument given as an array, a JSON array string,
 * a comma-separated string or a single number. Only undefined and null
 * count as missing.
 */
export function parseListParameter(raw: unknown): ListParameter {
  if (raw === undefined || raw === null) return { kind: 'missing' };

  if (Array.isArray(raw)) return listItems(raw);

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'values', values: [String(raw)] } : { kind: 'invalid', raw };
  }

  if (typeof raw === 'string') {
    const text = raw.trim();
    if (text === '') return { kind: 'values', values: [] };

    if (text.startsWith('[')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        return { kind: 'invalid', raw };
      }
      return Array.isArray(parsed) ? listItems(parsed) : { kind: 'invalid', raw };
    }

    // Amounts like "15,000" cannot be told apart from two entries; commas always split.
    // Blank entries are dropped, so " , " is an empty list.
    return listItems(text.split(','));
  }

  return { kind: 'invalid', raw };
}

// =============================================================================
// VEHICLE TYPE
// =============================================================================

/**
 * Map free-form vehicle descriptions ("Land Cruiser", "HEV", "lx 600") to a
 * canonical type. Synonyms are tried in table order, then broad keywords.
 * Unrecognized input becomes "standard" without complaint.
 */
export function normalizeVehicleType(input: unknown): VehicleType {
  if (input === undefined || input === null || input === '') return 'standard';

  const text = String(input).toLowerCase().trim();
  const rules = loadFinancingRules();

  for (const { type, synonyms } of rules.vehicleTypes) {
    if (synonyms.some(synonym => text === synonym || text.includes(synonym))) {
      return type;
    }
  }

  for (const { type, keywords } of rules.fallbackKeywords) {
    if (keywords.some(keyword => text.includes(keyword))) {
      return type;
    }
  }

  return 'standard';
}
