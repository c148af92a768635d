/**
 * Panel Calculations
 * Roof, bottom, drain, manhole, side (single or top/mid/low tiers) and partition panels.
 *
 * W = integer width, L = integer total length, N = partition count.
 */

import { DerivedDimensions, InsulationScope, ModuleResult, PanelOptions } from '../../types';
import { PANEL_SUFFIX_BY_STEP, PANEL_TIERS } from '../../constants';
import { PartListBuilder } from './builder';
import { stepToHeight } from './dimensions';

type PanelZone = 'roof' | 'side' | 'bottom';

const INSULATED_ZONES: Record<InsulationScope, PanelZone[]> = {
  none: [],
  full: ['roof', 'side', 'bottom'],
  roof: ['roof'],
  roof_side: ['roof', 'side']
};

function labelFor(insulation: InsulationScope) {
  const zones = INSULATED_ZONES[insulation];
  return (description: string, zone: PanelZone): string =>
    zones.includes(zone) ? `${description} (Insulated)` : description;
}

/** Height code used by low-tier and partition panels, e.g. 3.5 m -> 35 */
export function heightCode(height: number): number {
  return Math.trunc(Math.round(height * 100) / 10);
}

export function calculatePanels(dims: DerivedDimensions, options: PanelOptions): ModuleResult {
  const builder = new PartListBuilder('panels', 'Panels');

  if (options.product === 'not_included') {
    return builder.build();
  }

  const label = labelFor(options.insulation);
  const W = dims.width_int;
  const L = dims.total_length_int;
  const N = dims.partition_count;
  const hw = dims.half_width ? 1 : 0;
  const halfLen = dims.half_length_segments;
  const suffixes = PANEL_SUFFIX_BY_STEP[dims.table_step];

  // Roof
  const manhole = 1 + N;
  const roofQuarter = hw ? halfLen : 0;
  const roofHalf = W * halfLen + hw * L;
  const roofFull = builder.clamp('RF00M', W * L - manhole - roofQuarter);

  builder
    .add('MF00M', manhole, label('Manhole Panel', 'roof'))
    .add('RF00M', roofFull, label('Roof Panel 1x1m', 'roof'))
    .add('RH10M', roofHalf, label('Half Roof Panel 0.5x1m', 'roof'))
    .add('RQ10M', roofQuarter, label('Quarter Roof Panel 0.5x0.5m', 'roof'));

  // Bottom
  const bottom = suffixes.bottom;
  const drain = 1 + N;
  const partitionBottom = W * N;
  const halfPartitionAdjust = hw ? N : 0;
  const bottomFullNo = `BF${bottom}`;
  const bottomHalfNo = `BH${bottom}`;
  const bottomFull = builder.clamp(bottomFullNo, W * L - partitionBottom - drain);
  const bottomHalf = builder.clamp(bottomHalfNo, W * halfLen + hw * L - halfPartitionAdjust);

  builder
    .add(bottomFullNo, bottomFull, label('Bottom Panel 1x1m', 'bottom'))
    .add(bottomHalfNo, bottomHalf, label('Half Bottom Panel 0.5x1m', 'bottom'))
    .add(`BQ${bottom}`, roofQuarter, label('Quarter Bottom Panel 0.5x0.5m', 'bottom'))
    .add(`BF${bottom.slice(0, -1)}P`, partitionBottom, label('Partition Bottom Panel', 'bottom'))
    .add(`DN${bottom}`, drain, label('Drain Panel', 'bottom'));

  // Sides
  const side = suffixes.side;
  const sidePrefix = options.side_1x1 ? 'SF' : 'SL';
  const sideNo = `${sidePrefix}${side}`;
  const sideFull = builder.clamp(sideNo, (W + L) * 2 - 2 * N);
  const sideHalf = (hw + halfLen) * 2;
  const halfCode = side.slice(0, 2);
  const code = heightCode(stepToHeight(dims.table_step));

  if (dims.height_step >= PANEL_TIERS.multi_tier_from_step) {
    builder
      .add(sideNo, sideFull, label('Side Panel (Top)', 'side'))
      .add(`${sideNo}L`, N, label('Corner Side Panel (Top Left)', 'side'))
      .add(`${sideNo}R`, N, label('Corner Side Panel (Top Right)', 'side'));

    if (dims.height_step >= PANEL_TIERS.mid_tier_from_step) {
      const mid = PANEL_TIERS.mid_side_part;
      builder
        .add(mid, sideFull, label('Side Panel (Mid)', 'side'))
        .add(`${mid}L`, N, label('Corner Side Panel (Mid Left)', 'side'))
        .add(`${mid}R`, N, label('Corner Side Panel (Mid Right)', 'side'));
    }

    builder
      .add(`SF${code}L`, sideFull, label('Side Panel (Low)', 'side'))
      .add(`SF${code}LL`, N, label('Corner Side Panel (Low Left)', 'side'))
      .add(`SF${code}LR`, N, label('Corner Side Panel (Low Right)', 'side'));
  } else {
    builder
      .add(sideNo, sideFull, label('Side Panel', 'side'))
      .add(`${sideNo}L`, N, label('Corner Side Panel (Left)', 'side'))
      .add(`${sideNo}R`, N, label('Corner Side Panel (Right)', 'side'));
  }

  builder.add(`SH${halfCode}M`, sideHalf, label('Half Side Panel 0.5x1m', 'side'));

  // Partitions
  if (N > 0) {
    if (dims.height_step >= PANEL_TIERS.multi_tier_from_step) {
      builder.add(PANEL_TIERS.partition_top_part, W * N, 'Partition Panel (Top)');
      if (dims.height_step >= PANEL_TIERS.mid_tier_from_step) {
        builder.add(PANEL_TIERS.partition_mid_part, W * N, 'Partition Panel (Mid)');
      }
      builder.add(`PF${code}M`, W * N, 'Partition Panel (Low)');
    } else {
      // A height fraction adds one more row of panels per partition
      const extraRow = dims.height_frac > 0 ? 1 : 0;
      const partitionFull = W * dims.height_int * N + extraRow * W * N;
      const partitionHalf = hw * dims.height_int * N + extraRow * hw * N;
      const partitionPrefix = options.partition_1x1 ? 'SF' : 'SL';

      builder
        .add(`${partitionPrefix}${side}`, partitionFull, 'Partition Panel')
        .add(`SH${halfCode}M`, partitionHalf, 'Half Partition Panel');
    }
  }

  return builder.build();
}
