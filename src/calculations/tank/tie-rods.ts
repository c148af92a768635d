/**
 * Internal Tie-rod Calculations
 *
 * Up to 5 m wide, one rod cut to a standard length spans the width at every
 * position. Wider tanks use 4000 mm segments joined by connectors plus rods
 * sized to each compartment.
 *
 * W = integer width, L = integer total length, N = partition count.
 */

import { DerivedDimensions, TieRodMaterial, TieRodResult, TieRodSpec } from '../../types';
import { TIE_ROD, TIE_ROD_STANDARD_LENGTHS_MM, TIE_ROD_TIERS_BY_STEP } from '../../constants';
import { PartListBuilder } from './builder';

const MATERIAL_CODE = 'SA4';

const MATERIAL_LABELS: Record<TieRodMaterial, string> = {
  SS316: 'SS316',
  SS304: 'SS304',
  SS304_PET: 'SS304+PET coated',
  SS316_PE: 'SS316+PE Coated'
};

const SPEC_CODES: Record<TieRodSpec, string> = {
  M12: '12M',
  M16: '16M'
};

/** Closest standard rod length; an exact tie takes the shorter rod */
export function nearestStandardLength(mm: number): number {
  let best: number = TIE_ROD_STANDARD_LENGTHS_MM[0];
  for (const length of TIE_ROD_STANDARD_LENGTHS_MM) {
    if (Math.abs(length - mm) < Math.abs(best - mm)) {
      best = length;
    }
  }
  return best;
}

/** Standard rod for a span in meters, less the wall clearance */
export function rodLengthFor(spanM: number): number {
  return nearestStandardLength(Math.round(spanM * 1000) - TIE_ROD.clearance_mm);
}

export function tierCount(tableStep: number): number {
  return TIE_ROD_TIERS_BY_STEP[tableStep] ?? 0;
}

function isWide(dims: DerivedDimensions): boolean {
  return dims.width > TIE_ROD.single_span_max_m;
}

function hasOnlyLargeCompartments(dims: DerivedDimensions): boolean {
  const [first, ...rest] = dims.lengths;
  return first >= TIE_ROD.large_compartment_m
    && rest.every(length => length === 0 || length >= TIE_ROD.large_compartment_m);
}

/**
 * 4000 mm segments across a wide tank; one connector each
 */
export function wideSpanSegments(dims: DerivedDimensions, tiers: number): number {
  const N = dims.partition_count;
  const base = Math.max(0, dims.total_length_int - 1) * tiers * 2;
  if (N === 0) return base;

  // partition segments per tier grow with the tier count, in thousandths
  const perTier = TIE_ROD.partition_segment_slope * tiers - TIE_ROD.partition_segment_offset;
  return base + Math.trunc((N * tiers * perTier) / 1000);
}

/**
 * Rod assemblies, each taking four nuts and four washers
 */
export function assemblyCount(dims: DerivedDimensions, tiers: number): number {
  const N = dims.partition_count;
  const positions = Math.max(0, dims.total_length_int - 1);

  if (N > 0 && isWide(dims)) {
    if (hasOnlyLargeCompartments(dims)) {
      return Math.trunc((positions * tiers * 10 + N * tiers * TIE_ROD.large_partition_assembly_tenths) / 10);
    }
    return positions * tiers * 2 + N * TIE_ROD.mixed_partition_assemblies;
  }

  return (positions + N) * TIE_ROD.rods_per_position * tiers;
}

function addCompartmentRods(
  dims: DerivedDimensions,
  tiers: number,
  rod: (lengthMm: number, quantity: number) => void
): void {
  const N = dims.partition_count;
  const rows = TIE_ROD.compartment_rows;

  if (N > 0 && hasOnlyLargeCompartments(dims)) {
    rod(TIE_ROD.large_compartment_long_rod_mm, (N + 1) * rows * tiers);
    rod(TIE_ROD.large_compartment_short_rod_mm, Math.max(0, dims.total_length_int - 1) * tiers + N * 2);
    return;
  }

  const firstRod = rodLengthFor(dims.lengths[0]);
  if (firstRod !== TIE_ROD.full_compartment_rod_mm) {
    rod(firstRod, Math.max(0, dims.length_ints[0] - 1) * tiers * rows);
  }

  // later compartments grouped by rod length, plus the partition wall rods per group
  const positionsByRod = new Map<number, number>();
  dims.lengths.slice(1).forEach((length, i) => {
    if (length <= 0) return;
    const lengthMm = rodLengthFor(length);
    const positions = Math.max(0, dims.length_ints[i + 1] - 1);
    positionsByRod.set(lengthMm, (positionsByRod.get(lengthMm) ?? 0) + positions);
  });

  for (const [lengthMm, positions] of positionsByRod) {
    rod(lengthMm, positions * tiers * rows + N * tiers - 1);
  }
}

export function calculateTieRods(
  dims: DerivedDimensions,
  material: TieRodMaterial,
  spec: TieRodSpec
): TieRodResult {
  const builder = new PartListBuilder('tie_rods', 'Internal Tie-rod');
  const tiers = tierCount(dims.table_step);
  const specCode = SPEC_CODES[spec];
  const label = MATERIAL_LABELS[material];

  if (tiers === 0) {
    return { ...builder.build(), module: 'tie_rods', assemblies: 0 };
  }

  const rod = (lengthMm: number, quantity: number): void => {
    const partNo = `TR-${specCode}${lengthMm}${MATERIAL_CODE}`;
    builder.merge(partNo, builder.clamp(partNo, quantity), `Tie Rod ${lengthMm}mm ${spec} (${label})`);
  };

  if (isWide(dims)) {
    const segments = wideSpanSegments(dims, tiers);
    rod(TIE_ROD.segment_mm, segments);
    addCompartmentRods(dims, tiers, rod);
    builder.add(`TC-${specCode}60${MATERIAL_CODE}`, segments, `Tie Rod Connector ${spec} (${label})`);
  } else {
    rod(rodLengthFor(dims.width), assemblyCount(dims, tiers));
  }

  const assemblies = assemblyCount(dims, tiers);
  builder
    .add(`NUT(${MATERIAL_CODE})`, assemblies * TIE_ROD.nuts_per_assembly, `T/Rod Nut ${spec} (${label})`)
    .add(`BW(${MATERIAL_CODE})`, assemblies * TIE_ROD.washers_per_assembly, `T/Rod Washer ${spec} (${label})`);

  return {
    ...builder.build(),
    module: 'tie_rods',
    assemblies
  };
}
