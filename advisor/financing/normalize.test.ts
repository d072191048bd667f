import { describe, it, expect } from 'vitest';
import { normalizeVehicleType, parseListParameter, toBoolean, toNumber, toText } from './normalize.js';

describe('toNumber', () => {
  it('passes finite numbers through', () => {
    expect(toNumber(12.5, 0)).toBe(12.5);
    expect(toNumber(-3, 0)).toBe(-3);
  });

  it('strips separators and currency markers from strings', () => {
    expect(toNumber('65,700 AED', 0)).toBe(65700);
    expect(toNumber('$1,250.50', 0)).toBe(1250.5);
    expect(toNumber(' 48 ', 0)).toBe(48);
  });

  it('falls back for anything unparseable', () => {
    expect(toNumber('abc', 7)).toBe(7);
    expect(toNumber('12abc', 7)).toBe(7);
    expect(toNumber('', 7)).toBe(7);
    expect(toNumber('AED', 7)).toBe(7);
    expect(toNumber(null, 7)).toBe(7);
    expect(toNumber(undefined, 7)).toBe(7);
    expect(toNumber(Number.NaN, 7)).toBe(7);
    expect(toNumber(Number.POSITIVE_INFINITY, 7)).toBe(7);
    expect(toNumber(true, 7)).toBe(7);
    expect(toNumber({ amount: 5 }, 7)).toBe(7);
  });
});

describe('toBoolean', () => {
  it('keeps booleans', () => {
    expect(toBoolean(true, false)).toBe(true);
    expect(toBoolean(false, true)).toBe(false);
  });

  it('reads yes/no words case-insensitively', () => {
    expect(toBoolean('yes', false)).toBe(true);
    expect(toBoolean(' TRUE ', false)).toBe(true);
    expect(toBoolean('FALSE', true)).toBe(false);
    expect(toBoolean('0', true)).toBe(false);
  });

  it('treats numbers by non-zero', () => {
    expect(toBoolean(1, false)).toBe(true);
    expect(toBoolean(0, true)).toBe(false);
  });

  it('falls back for other values', () => {
    expect(toBoolean('maybe', true)).toBe(true);
    expect(toBoolean(undefined, false)).toBe(false);
  });
});

describe('toText', () => {
  it('trims strings and falls back for blanks', () => {
    expect(toText(' qatari ', 'individual')).toBe('qatari');
    expect(toText('   ', 'individual')).toBe('individual');
    expect(toText(undefined, 'individual')).toBe('individual');
  });
});

describe('parseListParameter', () => {
  it('accepts native arrays of numbers and strings', () => {
    expect(parseListParameter([10000, ' 15000 '])).toEqual({ kind: 'values', values: ['10000', '15000'] });
  });

  it('accepts comma-separated strings', () => {
    expect(parseListParameter('36, 48,60')).toEqual({ kind: 'values', values: ['36', '48', '60'] });
  });

  it('accepts JSON array strings', () => {
    expect(parseListParameter('["36","48"]')).toEqual({ kind: 'values', values: ['36', '48'] });
    expect(parseListParameter('[36, 48]')).toEqual({ kind: 'values', values: ['36', '48'] });
  });

  it('accepts a single number', () => {
    expect(parseListParameter(48)).toEqual({ kind: 'values', values: ['48'] });
  });

  it('reports missing input', () => {
    expect(parseListParameter(undefined)).toEqual({ kind: 'missing' });
    expect(parseListParameter(null)).toEqual({ kind: 'missing' });
  });

  it('keeps explicitly empty lists', () => {
    expect(parseListParameter([])).toEqual({ kind: 'values', values: [] });
    expect(parseListParameter('[]')).toEqual({ kind: 'values', values: [] });
    expect(parseListParameter(' , ')).toEqual({ kind: 'values', values: [] });
    expect(parseListParameter('  ')).toEqual({ kind: 'values', values: [] });
  });

  it('reports input that is not a list', () => {
    expect(parseListParameter('[36, 48')).toEqual({ kind: 'invalid', raw: '[36, 48' });
    expect(parseListParameter('[{"a":1}]')).toEqual({ kind: 'invalid', raw: [{ a: 1 }] });
    expect(parseListParameter({ amount: 5 })).toEqual({ kind: 'invalid', raw: { amount: 5 } });
    expect(parseListParameter([true])).toEqual({ kind: 'invalid', raw: [true] });
  });
});

describe('normalizeVehicleType', () => {
  it.each([
    ['Land Cruiser', 'land_cruiser'],
    ['landcruiser', 'land_cruiser'],
    ['LC', 'land_cruiser'],
    ['Toyota Land Cruiser', 'land_cruiser'],
    ['HEV', 'hybrid'],
    ['Hybrid', 'hybrid'],
    ['lx 600', 'lx600'],
    ['Lexus LX700', 'lx700'],
    ['regular', 'standard'],
  ])('maps %s to %s', (input, expected) => {
    expect(normalizeVehicleType(input)).toBe(expected);
  });

  it('checks hybrid synonyms before land cruiser ones', () => {
    expect(normalizeVehicleType('Land Cruiser Hybrid')).toBe('hybrid');
  });

  it('uses the broad keyword fallback', () => {
    expect(normalizeVehicleType('fully electric')).toBe('hybrid');
  });

  it('silently treats unrecognized input as standard', () => {
    expect(normalizeVehicleType('Camry')).toBe('standard');
    expect(normalizeVehicleType('')).toBe('standard');
    expect(normalizeVehicleType(undefined)).toBe('standard');
  });
});
