/**
 * Unit tests for reinforcing calculations
 */

import { calculateReinforcing, cornerBracketCount, skidFixingCount } from '../../src/calculations/tank/reinforcing';
import { deriveDimensions } from '../../src/calculations/tank/dimensions';
import { dimensions, quantities } from '../fixtures/tank';

describe('Reinforcing Calculations', () => {

  it('looks up corner brackets by step', () => {
    expect(cornerBracketCount(4)).toBe(0);
    expect(cornerBracketCount(5)).toBe(4);
    expect(cornerBracketCount(7)).toBe(8);
    expect(cornerBracketCount(10)).toBe(12);
  });

  it('counts four skid fixings per meter of width plus length', () => {
    expect(skidFixingCount(deriveDimensions(dimensions(5, [5], 2)))).toBe(40);
    expect(skidFixingCount(deriveDimensions(dimensions(10, [4, 2, 2], 3)))).toBe(72);
    expect(skidFixingCount(deriveDimensions(dimensions(10, [5, 5, 5], 4)))).toBe(100);
  });

  it('has no external corner brackets', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(5, [5], 4)), 'SS316');

    expect(result.parts.filter(p => p.part_no.startsWith('WBR-9090')).map(p => p.part_no)).toEqual(['WBR-9090SA4']);
  });

  it('uses external parts only for a 1 m tank', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(3, [3], 1)), 'SS316');

    expect(quantities(result)).toEqual({
      'WFB-0950ZP': 12,
      'WFB-1200Z': 8,
      'WCF-1000Z': 4
    });
    expect(result.skid_fixings).toBe(24);
  });

  it('adds cross plates from 2 m', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(5, [5], 2)), 'SS316');

    expect(quantities(result)).toEqual({
      'WFB-0950ZP': 20,
      'WFB-1200Z': 16,
      'WCF-2000Z': 4,
      'WCP-1780Z': 16,
      'WCP-1760SA4': 16
    });
  });

  it('adds tall reinforcing and brackets for a 5x5x3 m tank', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(5, [5], 3)), 'SS316');

    expect(quantities(result)).toEqual({
      'WFB-0950ZP': 44,
      'WFB-0950Z': 36,
      'WFB-1200Z': 16,
      'WCF-1000Z': 4,
      'WCF-2000Z': 4,
      'WCP-1780Z': 24,
      'WCP-1616Z': 16,
      'WCP-1760SA4': 16,
      'WCP-17160SA4': 16,
      'WBR-9090SA4': 4
    });
    expect(result.skid_fixings).toBe(40);
  });

  it('reports internal parts under the SA4 code with the grade in the description', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(5, [5], 3)), 'SS304');
    const plate = result.parts.find(p => p.part_no === 'WCP-1760SA4');

    expect(plate).toEqual({
      part_no: 'WCP-1760SA4',
      quantity: 16,
      category: 'Internal Reinforcing',
      description: 'Cross Plate 60 (SS304)'
    });
    expect(result.parts.find(p => p.part_no === 'WFB-0950ZP')?.category).toBe('External Reinforcing');
  });

  it('adds partition reinforcing for a partitioned tank', () => {
    const result = calculateReinforcing(deriveDimensions(dimensions(10, [4, 2, 2], 3)), 'SS316');

    expect(quantities(result)).toEqual({
      'WFB-0950ZP': 104,
      'WFB-0880ZP': 4,
      'WFB-0950Z': 68,
      'WFB-1200Z': 32,
      'WCF-1000Z': 4,
      'WCF-2000Z': 4,
      'WCP-1780Z': 40,
      'WCP-1616Z': 28,
      'WCP-1760SA4': 68,
      'WCP-17160SA4': 64,
      'WBR-9090SA4': 4,
      'WCP-1616SA4': 18,
      'WCP-1780SA4': 18,
      'WFB-0880SA4': 18,
      'WFB-0880PSA4': 22,
      'WFB-0950SA4': 40,
      'WFB-1200SA4': 18
    });
  });
});
