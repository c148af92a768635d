/**
 * Unit tests for panel calculations
 */

import { calculatePanels, heightCode } from '../../src/calculations/tank/panels';
import { deriveDimensions } from '../../src/calculations/tank/dimensions';
import { DEFAULT_PANEL_OPTIONS, dimensions, quantities } from '../fixtures/tank';

describe('Panel Calculations', () => {

  it('builds a 5x5x2 m tank without partitions', () => {
    const result = calculatePanels(deriveDimensions(dimensions(5, [5], 2)), DEFAULT_PANEL_OPTIONS);

    expect(quantities(result)).toEqual({
      'MF00M': 1,
      'RF00M': 24,
      'BF20M': 24,
      'DN20M': 1,
      'SL20S': 20
    });
    expect(result.clamped).toEqual([]);
  });

  it('adds half panels for a half-meter width', () => {
    const result = calculatePanels(deriveDimensions(dimensions(5.5, [6], 2)), DEFAULT_PANEL_OPTIONS);

    expect(quantities(result)).toEqual({
      'MF00M': 1,
      'RF00M': 29,
      'RH10M': 6,
      'BF20M': 29,
      'BH20M': 6,
      'DN20M': 1,
      'SL20S': 22,
      'SH20M': 2
    });
  });

  it('uses 1x1 side panels when selected', () => {
    const result = calculatePanels(
      deriveDimensions(dimensions(5, [5], 2)),
      { ...DEFAULT_PANEL_OPTIONS, side_1x1: true }
    );

    const parts = quantities(result);
    expect(parts['SF20S']).toBe(20);
    expect(parts['SL20S']).toBeUndefined();
  });

  it('splits sides into top, mid and low tiers for a partitioned 4.5 m tank', () => {
    const result = calculatePanels(deriveDimensions(dimensions(10, [5, 5], 4.5)), DEFAULT_PANEL_OPTIONS);
    const parts = quantities(result);

    expect(parts['SL15T']).toBe(38);
    expect(parts['SL15TL']).toBe(1);
    expect(parts['SL15TR']).toBe(1);
    expect(parts['SF30M']).toBe(38);
    expect(parts['SF30ML']).toBe(1);
    expect(parts['SF45L']).toBe(38);
    expect(parts['SF45LR']).toBe(1);
    expect(parts['PL20TCB']).toBe(10);
    expect(parts['SN30M']).toBe(10);
    expect(parts['PF45M']).toBe(10);
    expect(parts['BF45P']).toBe(10);
  });

  it('adds an extra partition row when the height has a half meter', () => {
    const result = calculatePanels(deriveDimensions(dimensions(4, [2, 2], 1.5)), DEFAULT_PANEL_OPTIONS);

    const partition = result.parts.find(p => p.description === 'Partition Panel');
    expect(partition).toEqual({
      part_no: 'SL15S',
      quantity: 8,
      category: 'Panels',
      description: 'Partition Panel'
    });

    const side = result.parts.find(p => p.description === 'Side Panel');
    expect(side?.quantity).toBe(14);
    expect(result.parts.find(p => p.part_no === 'MF00M')?.quantity).toBe(2);
    expect(result.parts.find(p => p.part_no === 'BF15P')?.quantity).toBe(4);
  });

  it('adds one half partition panel per row for a half-meter width', () => {
    // 1.5 m: one full row plus the extra half-meter row
    const result = calculatePanels(deriveDimensions(dimensions(4.5, [3, 3], 1.5)), DEFAULT_PANEL_OPTIONS);

    expect(result.parts.find(p => p.description === 'Partition Panel')?.quantity).toBe(8);
    expect(result.parts.find(p => p.description === 'Half Partition Panel')).toEqual({
      part_no: 'SH15M',
      quantity: 2,
      category: 'Panels',
      description: 'Half Partition Panel'
    });
    expect(result.parts.find(p => p.description === 'Half Side Panel 0.5x1m')?.quantity).toBe(2);
  });

  it('clamps a negative bottom count to zero and records it', () => {
    const result = calculatePanels(deriveDimensions(dimensions(1, [1, 1], 1)), DEFAULT_PANEL_OPTIONS);

    expect(result.parts.find(p => p.part_no === 'BF10M')).toBeUndefined();
    expect(result.clamped).toEqual([
      { module: 'panels', part_no: 'BF10M', raw_quantity: -1 }
    ]);
  });

  it('returns no panels when the product is not included', () => {
    const result = calculatePanels(
      deriveDimensions(dimensions(5, [5], 2)),
      { ...DEFAULT_PANEL_OPTIONS, product: 'not_included' }
    );

    expect(result.parts).toEqual([]);
  });

  describe('insulation', () => {

    it('marks only roof panels for roof insulation', () => {
      const result = calculatePanels(
        deriveDimensions(dimensions(5, [5], 2)),
        { ...DEFAULT_PANEL_OPTIONS, insulation: 'roof' }
      );

      expect(result.parts.find(p => p.part_no === 'RF00M')?.description).toBe('Roof Panel 1x1m (Insulated)');
      expect(result.parts.find(p => p.part_no === 'SL20S')?.description).toBe('Side Panel');
      expect(result.parts.find(p => p.part_no === 'BF20M')?.description).toBe('Bottom Panel 1x1m');
    });

    it('marks roof and side panels for roof and side insulation', () => {
      const result = calculatePanels(
        deriveDimensions(dimensions(5, [5], 2)),
        { ...DEFAULT_PANEL_OPTIONS, insulation: 'roof_side' }
      );

      expect(result.parts.find(p => p.part_no === 'SL20S')?.description).toBe('Side Panel (Insulated)');
      expect(result.parts.find(p => p.part_no === 'DN20M')?.description).toBe('Drain Panel');
    });
  });

  it('derives height codes from meters', () => {
    expect(heightCode(3)).toBe(30);
    expect(heightCode(3.5)).toBe(35);
    expect(heightCode(4.5)).toBe(45);
  });
});
