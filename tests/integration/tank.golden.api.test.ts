/**
 * Integration tests for the full tank calculation
 * Reference tanks plus the properties every BOM must hold
 */

import { calculateTank } from '../../src/calculations/tank';
import * as fittingsModule from '../../src/calculations/tank/fittings';
import * as reinforcingModule from '../../src/calculations/tank/reinforcing';
import { BOMItem, TankCalculationResult } from '../../src/types';
import { dimensions, fixtureCatalog, tankConfig } from '../fixtures/tank';
import referenceTanks from '../fixtures/reference-tanks.json';

interface ReferenceTank {
  name: string;
  width: number;
  lengths: number[];
  height: number;
  bom: Record<string, Record<string, number | undefined>>;
}

const REFERENCE_TANKS: ReferenceTank[] = referenceTanks;

function run(width: number, lengths: number[], height: number, quantity = 1): TankCalculationResult {
  return calculateTank(tankConfig(dimensions(width, lengths, height, quantity)), fixtureCatalog());
}

function qty(bom: BOMItem[], partNo: string): number | undefined {
  return bom.find(item => item.part_no === partNo)?.quantity;
}

/** category -> part_no -> quantity */
function byCategory(bom: BOMItem[]): Record<string, Record<string, number>> {
  const grouped: Record<string, Record<string, number>> = {};
  for (const item of bom) {
    const lines = grouped[item.category] ?? {};
    lines[item.part_no] = (lines[item.part_no] ?? 0) + item.quantity;
    grouped[item.category] = lines;
  }
  return grouped;
}

describe('Tank Calculation Integration', () => {

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // =========================================================================
  // Reference tanks
  // =========================================================================

  describe('reference tanks', () => {

    // Internal WBR-9090SA4 follows the corner bracket table: 8 at 5x5x4 and
    // 34 at 10x5+5+5x4, where the per-height formula gives 24 and 50.
    for (const tank of REFERENCE_TANKS) {
      it(`matches the full BOM for ${tank.name} m`, () => {
        const result = run(tank.width, tank.lengths, tank.height);

        expect(result.success).toBe(true);
        expect(result.diagnostics.clamped).toEqual([]);
        expect(byCategory(result.bom)).toEqual(tank.bom);
      });
    }

    it('counts partitions on the 10 m tank', () => {
      const { capacity } = run(10, [4, 2, 2], 3);
      expect(capacity.num_partitions).toBe(2);
    });

    it('gives a 2.8 m tank the same quantities as a 3.0 m tank', () => {
      const lines = (height: number) =>
        run(5, [5], height).bom.map(item => [item.category, item.part_no, item.quantity]);

      expect(lines(2.8)).toEqual(lines(3));
    });

    it('gives a 3.8 m partitioned tank the same quantities as a 4.0 m tank', () => {
      const lines = (height: number) =>
        run(10, [5, 5, 5], height).bom.map(item => [item.category, item.part_no, item.quantity]);

      expect(lines(3.8)).toEqual(lines(4));
    });
  });

  // =========================================================================
  // Pricing and diagnostics
  // =========================================================================

  describe('pricing', () => {

    it('totals cost and weight from the catalog', () => {
      const { cost_summary, weight_summary } = run(5, [5], 2);

      expect(cost_summary.panels).toBe(1300);
      expect(cost_summary.bolts_nuts).toBe(22.5);
      expect(cost_summary.steel_skid).toBe(332);
      expect(cost_summary.etc).toBe(90);
      expect(cost_summary.total_usd).toBe(1744.5);
      expect(cost_summary.total_local).toBe(6541.88);
      expect(cost_summary.currency).toBe('SAR');

      expect(weight_summary.panels_kg).toBe(255);
      expect(weight_summary.steel_kg).toBe(258);
      expect(weight_summary.accessories_kg).toBe(4.5);
      expect(weight_summary.total_kg).toBe(517.5);
    });

    it('lists catalog misses once and flags their lines', () => {
      const { bom, diagnostics } = run(5, [5], 2);

      expect(diagnostics.missing_parts).toContain('SL20S');
      expect(diagnostics.missing_parts).not.toContain('MF00M');
      expect(new Set(diagnostics.missing_parts).size).toBe(diagnostics.missing_parts.length);
      expect(bom.find(item => item.part_no === 'SL20S')?.catalog_found).toBe(false);
    });

    it('carries provenance and echoes order information', () => {
      const config = tankConfig(dimensions(5, [5], 2), { order_info: { order_no: 'Q-2001' } });
      const result = calculateTank(config, fixtureCatalog());

      expect(result.provenance).toEqual({ engine_version: '1.0.0', table_version: '2025.2' });
      expect(result.order_info).toEqual({ order_no: 'Q-2001' });
    });
  });

  // =========================================================================
  // Module isolation
  // =========================================================================

  describe('module failures', () => {

    it('reports a failing module and keeps the rest of the BOM', () => {
      jest.spyOn(fittingsModule, 'calculateFittings').mockImplementation(() => {
        throw new Error('fitting table unavailable');
      });

      const result = calculateTank(
        tankConfig(dimensions(5, [5], 2), { fittings: [{ type: 'SD', size: 50, quantity: 1 }] }),
        fixtureCatalog()
      );

      expect(result.success).toBe(false);
      expect(result.diagnostics.module_errors).toEqual([
        { module: 'fittings', message: 'fitting table unavailable' }
      ]);
      expect(qty(result.bom, 'MF00M')).toBe(1);
      expect(qty(result.bom, 'WSD-050A')).toBeUndefined();
      expect(result.cost_summary.fittings).toBe(0);
    });

    it('estimates skid fixings and tape when reinforcing fails', () => {
      jest.spyOn(reinforcingModule, 'calculateReinforcing').mockImplementation(() => {
        throw new Error('reinforcing table unavailable');
      });

      const result = run(5, [5], 3);

      expect(result.diagnostics.module_errors.map(e => e.module)).toEqual(['reinforcing']);
      expect(result.diagnostics.warnings.map(w => w.code)).toEqual(['TAPE_ESTIMATED', 'FIXINGS_ESTIMATED']);
      expect(qty(result.bom, 'WBT-1240Z')).toBe(40);
      expect(qty(result.bom, 'WST-0050RO')).toBe(386);
      expect(result.bom.some(item => item.category === 'External Reinforcing')).toBe(false);
    });
  });

  // =========================================================================
  // Properties
  // =========================================================================

  describe('properties', () => {
    const HEIGHTS = [1, 1.5, 2, 2.5, 3, 3.5, 4, 4.5, 5];
    const FOOTPRINTS: Array<[number, number[]]> = [
      [1, [1]],
      [2.5, [3.5]],
      [5, [5]],
      [10.5, [4, 2.5]],
      [12, [6, 6, 6, 6]]
    ];

    it('is deterministic', () => {
      const first = JSON.stringify(run(10, [5, 5, 5], 4));
      const second = JSON.stringify(run(10, [5, 5, 5], 4));
      expect(second).toBe(first);
    });

    it('emits only positive integer quantities', () => {
      for (const [width, lengths] of FOOTPRINTS) {
        for (const height of HEIGHTS) {
          const result = run(width, lengths, height);

          expect(result.diagnostics.module_errors).toEqual([]);
          for (const item of result.bom) {
            expect(Number.isInteger(item.quantity)).toBe(true);
            expect(item.quantity).toBeGreaterThan(0);
          }
        }
      }
    });

    it('never lowers manhole, drain or internal ladder counts when partitions are added', () => {
      const counts = [[8], [4, 4], [4, 2, 2]].map(lengths => {
        const { bom } = run(10, lengths, 3);
        return [qty(bom, 'MF00M'), qty(bom, 'DN30M'), qty(bom, 'WLD-3000FI')];
      });

      expect(counts).toEqual([
        [1, 1, 1],
        [2, 2, 2],
        [3, 3, 3]
      ]);
    });

    it('changes panel part numbers only at half-meter breakpoints', () => {
      const partNumbers = (height: number) =>
        run(5, [5], height).bom.filter(item => item.category === 'Panels').map(item => item.part_no);

      expect(partNumbers(2.9)).toEqual(partNumbers(3));
      expect(partNumbers(3.1)).toEqual(partNumbers(3));
      expect(partNumbers(3.25)).toEqual(partNumbers(3));
      expect(partNumbers(3.3)).toEqual(partNumbers(3.5));
    });

    it('scales linearly with the number of tanks', () => {
      const single = run(10, [4, 2, 2], 3);
      const triple = run(10, [4, 2, 2], 3, 3);

      expect(triple.bom.map(item => item.quantity)).toEqual(single.bom.map(item => item.quantity * 3));
      expect(triple.cost_summary.total_usd).toBeCloseTo(single.cost_summary.total_usd * 3, 2);
      expect(triple.weight_summary.total_kg).toBeCloseTo(single.weight_summary.total_kg * 3, 2);
    });
  });
});
