/**
 * Unit tests for steel skid calculations
 */

import { calculateSteelSkid, linerQuantity, resolveSkidProfile } from '../../src/calculations/tank/steel-skid';
import { deriveDimensions } from '../../src/calculations/tank/dimensions';
import { dimensions, quantities } from '../fixtures/tank';

describe('Steel Skid Calculations', () => {

  describe('resolveSkidProfile', () => {

    it('picks the default profile by height', () => {
      expect(resolveSkidProfile('default', 2.5)).toBe('angle_75');
      expect(resolveSkidProfile('default', 3)).toBe('channel_125');
      expect(resolveSkidProfile('default', 4.5)).toBe('channel_150');
    });

    it('keeps an explicit profile whatever the height', () => {
      expect(resolveSkidProfile('angle_75', 5)).toBe('angle_75');
    });

    it('returns null when the skid is excluded', () => {
      expect(resolveSkidProfile('except', 3)).toBeNull();
    });
  });

  it('builds a 75 angle skid for a 5x5x2 m tank', () => {
    const result = calculateSteelSkid(deriveDimensions(dimensions(5, [5], 2)), 'default');

    expect(quantities(result)).toEqual({
      'WBR-7575Z': 12,
      'WBR-0240Z': 4,
      'WFF-1990ALZ': 12,
      'WFF-0990ALZ': 6,
      'WFF-2000ASZ': 2,
      'WFF-1570ASZR': 2,
      'WFF-1570ASZL': 2,
      'WFF-0957AMZ': 8,
      'WFF-1063AMZ': 4,
      'WFF-0994AMZ': 8,
      'LNR-3.0T': 166,
      'WBR-5010Z': 10
    });
  });

  it('builds a 125 channel skid for a long 4 m tank', () => {
    const result = calculateSteelSkid(deriveDimensions(dimensions(10, [5, 5, 5], 4)), 'default');

    expect(quantities(result)).toEqual({
      'WBR-0120Z': 22,
      'WBR-21590Z': 8,
      'WFF-1990CLZ': 77,
      'WFF-0990CLZ': 11,
      'WFF-2000CSZ': 6,
      'WFF-2060CSZR': 2,
      'WFF-2060CSZL': 2,
      'WFF-0962AMZ': 28,
      'WFF-1053AMZ': 14,
      'WFF-0994AMZ': 98,
      'LNR-3.0T': 810,
      'WBR-5010Z': 50
    });
  });

  it('picks the default profile from the stepped height', () => {
    // 2.6 m sits on the 2.5 m step
    const result = calculateSteelSkid(deriveDimensions(dimensions(5, [5], 2.6)), 'default');
    expect(result.parts[0].part_no).toBe('WBR-7575Z');
  });

  it('returns nothing when the skid is excluded', () => {
    const result = calculateSteelSkid(deriveDimensions(dimensions(5, [5], 2)), 'except');
    expect(result.parts).toEqual([]);
  });

  it('clamps sub-frames for a tank under one meter wide', () => {
    const result = calculateSteelSkid(deriveDimensions(dimensions(0.5, [1], 1)), 'default');

    expect(result.clamped).toEqual([
      { module: 'steel_skid', part_no: 'WFF-0957AMZ', raw_quantity: -2 },
      { module: 'steel_skid', part_no: 'WFF-0994AMZ', raw_quantity: -2 }
    ]);
    expect(result.parts.every(p => p.quantity > 0)).toBe(true);
  });

  describe('linerQuantity', () => {

    it('uses the per-area factor of the floor size band', () => {
      expect(linerQuantity(deriveDimensions(dimensions(5, [5], 2)))).toBe(166);
      expect(linerQuantity(deriveDimensions(dimensions(8, [8], 2)))).toBe(364);
      expect(linerQuantity(deriveDimensions(dimensions(10, [5, 5, 5], 4)))).toBe(810);
    });
  });
});
