/**
 * Bolts & Nuts Calculations
 *
 * External bolts assemble the panels and the skid; internal bolts fix the
 * stainless reinforcing and the partition rubber joints. The M12x40 count
 * is the skid fixing count reported by the reinforcing module.
 */

import { BoltMaterial, BoltSelection, DerivedDimensions, ModuleResult } from '../../types';
import { BOLT_COEFFICIENTS as C, BOLT_MATERIAL_CODES } from '../../constants';
import { PartListBuilder } from './builder';
import { skidFixingCount } from './reinforcing';

function tenths(value: number, coefficient: number): number {
  return Math.trunc((value * coefficient) / 10);
}

interface BoltContext {
  W: number;
  L: number;
  N: number;
  HC: number;
  tall: boolean;
  long: boolean;
  joints: number;
  perimeter: number;
  lengthHalves: number;
}

function contextFor(dims: DerivedDimensions): BoltContext {
  const W = dims.width_int;
  const L = dims.total_length_int;
  return {
    W,
    L,
    N: dims.partition_count,
    HC: dims.height_int,
    tall: dims.height_step >= 8,
    long: dims.total_length > 10,
    joints: Math.max(0, W - 1) + Math.max(0, L - 1),
    perimeter: 2 * (W + L),
    lengthHalves: Math.round(dims.total_length * 2)
  };
}

function addExternalBolts(
  builder: PartListBuilder,
  ctx: BoltContext,
  material: BoltMaterial,
  skidFixings: number
): void {
  const { W, L, N, HC, tall, long, joints, perimeter, lengthHalves } = ctx;
  const code = BOLT_MATERIAL_CODES[material];

  // M14x40: roof/bottom joints plus side rows
  const base = W + L + 2 * joints;
  let m14x40 = HC >= 4
    ? base + C.m14x40_tall_base + C.m14x40_tall_per_height * (HC - 3)
    : base + C.m14x40_short_per_height * HC;
  if (N > 0) {
    m14x40 *= 2;
    if (tall && long) {
      m14x40 += Math.trunc((N * (lengthHalves - 20) * C.m14x40_long_partition_tenths) / 20);
    }
  }
  builder.add(`WBT-1440${code}`, m14x40, 'M14x40mm Bolt');

  let m10x35: number;
  if (N > 0) {
    m10x35 = 10 * (W + L) + (long ? C.m10x35_partition_long : C.m10x35_partition_short);
  } else {
    m10x35 = 16 * joints;
    if (HC > 2) {
      m10x35 += (8 * (W + L - 2) + 4) * (HC - 2);
    }
  }
  builder.add(`WBT-1035${code}`, builder.clamp(`WBT-1035${code}`, m10x35), 'M10x35mm Bolt');

  let m10x50 = 8 * perimeter + 8 * (perimeter + 2 * joints) * HC;
  if (N > 0) {
    m10x50 += C.m10x50_partition_per_width * N * W;
    if (tall) {
      m10x50 += C.m10x50_partition_tall_per_width * N * W * (HC - 2);
    }
  }
  builder.add(`WBT-1050${code}`, m10x50, 'M10x50mm Bolt');

  builder.add(`WBT-1240${code}`, skidFixings, 'M12x40mm Bolt');

  // Rubber-mounted M14x120 are galvanized whatever the selection
  let m14x120 = C.m14x120_base;
  if (HC > 2) m14x120 += 8 * (W + L) * (HC - 2);
  if (HC > 3) m14x120 += builder.clamp('WBT-14120RD', 8 * (W + L - 2) * (HC - 3));
  if (N > 0) {
    m14x120 += 8 * N;
    if (tall && long) m14x120 += 2 * N;
  }
  builder.add('WBT-14120RD', m14x120, 'M14x120mm Rubber HDG Bolt');
}

function addInternalBolts(builder: PartListBuilder, ctx: BoltContext, material: BoltMaterial): void {
  const { W, L, N, HC, tall, long, perimeter } = ctx;
  const code = BOLT_MATERIAL_CODES[material];

  if (N === 0) {
    builder
      .add(`WBT-1035${code}`, 8 * perimeter, 'M10x35mm Internal Bolt')
      .add(`WBT-1050${code}`, 8 * (W + L), 'M10x50mm Internal Bolt');
    return;
  }

  const partitionWidth = N * W;

  let m10x35 = 8 * perimeter + 10 * partitionWidth;
  if (tall) {
    m10x35 += tenths(N * (W + L) * (HC - 2), C.internal_m10x35_tall_tenths);
  }
  builder.add(`WBT-1035${code}`, m10x35, 'M10x35mm Internal Bolt');

  let m10x50 = 8 * (W + L) + 16 * partitionWidth * HC + 16 * N;
  if (tall && long) {
    m10x50 += tenths(partitionWidth * (HC - 2), C.internal_m10x50_long_tenths);
  }
  builder.add(`WBT-1050${code}`, m10x50, 'M10x50mm Internal Bolt');

  builder
    .add(
      `WBT-1058R${code}`,
      tenths(partitionWidth, tall ? C.rubber_m10x58_tall_tenths : C.rubber_m10x58_tenths),
      'M10x58mm Rubber Internal Bolt'
    )
    .add(
      `WBT-14120R${code}`,
      tenths(partitionWidth, tall ? C.rubber_m14x120_tall_tenths : C.rubber_m14x120_tenths),
      'M14x120mm Rubber Internal Bolt'
    );
}

/**
 * @param skidFixings fixing count from the reinforcing result; null when that
 *   result is unavailable
 */
export function calculateBolts(
  dims: DerivedDimensions,
  selection: BoltSelection,
  skidFixings: number | null
): ModuleResult {
  const builder = new PartListBuilder('bolts', 'Bolts & Nuts');
  const ctx = contextFor(dims);

  if (selection.external) {
    addExternalBolts(builder, ctx, selection.external, skidFixings ?? skidFixingCount(dims));
  }

  if (selection.internal) {
    addInternalBolts(builder, ctx, selection.internal);
  }

  return builder.build();
}
