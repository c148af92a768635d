/**
 * Unit tests for fittings
 */

import {
  calculateFittings,
  fittingPartNumber,
  isFittingType,
  listAvailableFittings,
  parseFittingPartNumber,
  recommendFittings
} from '../../src/calculations/tank/fittings';
import { deriveDimensions } from '../../src/calculations/tank/dimensions';
import { dimensions } from '../fixtures/tank';

describe('Fittings', () => {

  it('builds zero-padded part numbers', () => {
    expect(fittingPartNumber('FL', 100)).toBe('WFL-100A');
    expect(fittingPartNumber('SD', 50)).toBe('WSD-050A');
    expect(fittingPartNumber('OUT', 65)).toBe('WOT-065A');
  });

  describe('parseFittingPartNumber', () => {

    it('parses a part number back to type and size', () => {
      expect(parseFittingPartNumber('WFL-100A')).toEqual({ type: 'FL', size: 100 });
      expect(parseFittingPartNumber(' wsd-050a ')).toEqual({ type: 'SD', size: 50 });
      expect(parseFittingPartNumber('WOT-150A')).toEqual({ type: 'OUT', size: 150 });
    });

    it('returns null for unknown prefixes or shapes', () => {
      expect(parseFittingPartNumber('WXX-050A')).toBeNull();
      expect(parseFittingPartNumber('WFL100')).toBeNull();
    });
  });

  it('recognises fitting type codes', () => {
    expect(isFittingType('OUT')).toBe(true);
    expect(isFittingType('XX')).toBe(false);
  });

  it('sums duplicate fittings into one line', () => {
    const result = calculateFittings([
      { type: 'SD', size: 50, quantity: 2 },
      { type: 'FL', size: 100, quantity: 1 },
      { type: 'SD', size: 50, quantity: 1 }
    ]);

    expect(result.parts).toEqual([
      { part_no: 'WSD-050A', quantity: 3, category: 'Fittings', description: 'Suction/Drain 50mm' },
      { part_no: 'WFL-100A', quantity: 1, category: 'Fittings', description: 'Flat Flange 100mm' }
    ]);
  });

  it('lists every type and standard size', () => {
    const fittings = listAvailableFittings();

    expect(fittings).toHaveLength(39);
    expect(fittings[0]).toEqual({
      type: 'SF',
      size: 65,
      part_no: 'WSF-065A',
      description: 'Slant Flange 65mm'
    });
  });

  describe('recommendFittings', () => {

    it('sizes fittings for a 50 m3 tank', () => {
      expect(recommendFittings(deriveDimensions(dimensions(5, [5], 2)))).toEqual([
        { type: 'SD', size: 65, quantity: 1, part_no: 'WSD-065A', description: 'Drain 65mm', recommended: true },
        { type: 'SF', size: 80, quantity: 1, part_no: 'WSF-080A', description: 'Overflow 80mm', recommended: true },
        { type: 'FL', size: 80, quantity: 2, part_no: 'WFL-080A', description: 'Flange 80mm', recommended: true }
      ]);
    });

    it('uses one drain and overflow per compartment on a large tank', () => {
      const [drain, overflow, flange] = recommendFittings(deriveDimensions(dimensions(10, [5, 5, 5], 4)));

      expect(drain.quantity).toBe(3);
      expect(drain.size).toBe(150);
      expect(overflow.quantity).toBe(3);
      expect(flange.quantity).toBe(2);
      expect(flange.size).toBe(150);
    });
  });
});
