import { describe, it, expect } from 'vitest';
import { listVehicleTypes, titleCase, type VehicleTypeCatalogue, type VehicleTypeCatalogueOutcome } from './vehicle-types.js';

function expectCatalogue(outcome: VehicleTypeCatalogueOutcome): VehicleTypeCatalogue {
  if (!outcome.success) {
    throw new Error(`expected success, got: ${outcome.error}`);
  }
  return outcome;
}

describe('titleCase', () => {
  it('capitalizes each alphabetic run', () => {
    expect(titleCase('land cruiser')).toBe('Land Cruiser');
    expect(titleCase('lx600')).toBe('Lx600');
    expect(titleCase('HEV')).toBe('Hev');
  });
});

describe('listVehicleTypes', () => {
  it('lists every canonical type in table order', () => {
    const catalogue = expectCatalogue(listVehicleTypes());
    expect(Object.keys(catalogue.vehicleTypes)).toEqual(['standard', 'hybrid', 'land_cruiser', 'lx600', 'lx700']);
  });

  it('describes types under the current rules', () => {
    const catalogue = expectCatalogue(
      listVehicleTypes(true, { now: () => new Date('2026-02-01T00:00:00.000Z') })
    );
    expect(catalogue.rulesVersion).toBe('new_rules_2024');
    expect(catalogue.timestamp).toBe('2026-02-01T00:00:00.000Z');
    expect(catalogue.vehicleTypes['land_cruiser']).toEqual({
      description: 'Land Cruiser',
      exampleVariations: ['land cruiser', 'landcruiser', 'lc'],
      profitRatePercentage: 6.9,
      rulesApplied: 'new_rules_2024',
    });
    expect(catalogue.vehicleTypes['standard']?.profitRatePercentage).toBe(5.75);
    expect(catalogue.vehicleTypes['hybrid']?.profitRatePercentage).toBe(3.9);
    expect(catalogue.vehicleTypes['lx600']?.description).toBe('Lx600');
  });

  it('quotes legacy rates at a 20% down payment', () => {
    const catalogue = expectCatalogue(listVehicleTypes(false));
    expect(catalogue.rulesVersion).toBe('old_rules');
    expect(catalogue.vehicleTypes['standard']?.profitRatePercentage).toBe(6.8);
    expect(catalogue.vehicleTypes['hybrid']?.profitRatePercentage).toBe(4.9);
    expect(catalogue.vehicleTypes['land_cruiser']?.profitRatePercentage).toBe(8.16);
    expect(catalogue.vehicleTypes['lx700']?.profitRatePercentage).toBe(8.16);
  });
});
