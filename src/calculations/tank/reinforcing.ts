/**
 * Reinforcing Calculations
 *
 * External (galvanized) frames, plates and flat bars, and internal stainless
 * plates and brackets. Internal parts are always reported under the SA4 code;
 * the selected grade only shows in the description.
 */

import { DerivedDimensions, ReinforcingResult, StainlessGrade } from '../../types';
import {
  CORNER_BRACKETS_BY_STEP,
  CORNER_FRAMES_BY_STEP,
  PARTITION_REINFORCING_TENTHS,
  REINFORCING_GATES,
  SKID_FIXINGS_PER_METER
} from '../../constants';
import { PartListBuilder } from './builder';

const INTERNAL_CODE = 'SA4';

/**
 * Corner bracket (WBR-9090) count for a table step; zero below 2.5 m
 */
export function cornerBracketCount(tableStep: number): number {
  return CORNER_BRACKETS_BY_STEP[tableStep] ?? 0;
}

/**
 * External reinforcing fixings on the skid: four per meter of W + L
 */
export function skidFixingCount(dims: DerivedDimensions): number {
  return SKID_FIXINGS_PER_METER * (dims.width_int + dims.total_length_int);
}

function tenths(value: number, coefficient: number): number {
  return Math.trunc((value * coefficient) / 10);
}

interface ReinforcingContext {
  W: number;
  L: number;
  N: number;
  HC: number;
  step: number;
  tall: boolean;
  long: boolean;
  joints: number;
  lengthHalves: number;
}

function contextFor(dims: DerivedDimensions): ReinforcingContext {
  return {
    W: dims.width_int,
    L: dims.total_length_int,
    N: dims.partition_count,
    HC: dims.height_int,
    step: dims.table_step,
    tall: dims.height_step >= REINFORCING_GATES.extra_tall_from_step,
    long: dims.total_length > 10,
    joints: Math.max(0, dims.width_int - 1) + Math.max(0, dims.total_length_int - 1),
    lengthHalves: Math.round(dims.total_length * 2)
  };
}

function addInternal(
  builder: PartListBuilder,
  ctx: ReinforcingContext,
  material: StainlessGrade
): void {
  const { W, L, N, HC, step, tall, long } = ctx;
  const category = 'Internal Reinforcing';
  const lengthSpans = Math.max(0, L - 1);
  const partitionWidth = N * W;

  if (step < REINFORCING_GATES.internal_from_step) {
    return;
  }

  const plate60 = 4 * lengthSpans + (N > 0 ? tenths(partitionWidth, long ? 15 : 20) : 0);
  builder.add(`WCP-1760${INTERNAL_CODE}`, plate60, `Cross Plate 60 (${material})`, category);

  if (step >= REINFORCING_GATES.tall_from_step) {
    const plate160 = N > 0
      ? (4 * lengthSpans + tenths(partitionWidth, long ? 11 : 18)) * (HC - 2)
      : plate60 * (HC - 2);
    builder.add(`WCP-17160${INTERNAL_CODE}`, builder.clamp(`WCP-17160${INTERNAL_CODE}`, plate160),
      `Cross Plate 160 (${material})`, category);
  }

  if (step >= REINFORCING_GATES.internal_bracket_from_step) {
    let brackets = cornerBracketCount(step);
    if (step >= REINFORCING_GATES.extra_tall_from_step && N > 0) {
      brackets += 13 * N;
    }
    builder.add(`WBR-9090${INTERNAL_CODE}`, brackets, `Corner Bracket (${material})`, category);
  }

  if (N > 0 && step >= REINFORCING_GATES.partition_from_step) {
    for (const [base, coefficient] of Object.entries(PARTITION_REINFORCING_TENTHS)) {
      const qty = tenths(partitionWidth, tall ? coefficient.tall : coefficient.short);
      builder.add(`${base}${INTERNAL_CODE}`, qty, `Partition Reinforcing ${base} (${material})`, category);
    }
  }
}

function addExternal(builder: PartListBuilder, ctx: ReinforcingContext): void {
  const { W, L, N, HC, step, long, joints, lengthHalves } = ctx;
  const perimeter = W + L;
  const lengthSpans = Math.max(0, L - 1);

  let flatBarPlate = 2 * perimeter;
  if (step >= REINFORCING_GATES.tall_from_step) flatBarPlate += (2 * perimeter + 4) * (HC - 2);
  if (step >= REINFORCING_GATES.extra_tall_from_step) flatBarPlate += 4 * (HC - 3);
  if (N > 0) flatBarPlate += tenths(N * W, long ? 16 : 14);
  builder.add('WFB-0950ZP', builder.clamp('WFB-0950ZP', flatBarPlate), 'Flat Bar 950 with Plate');

  if (N > 0 && step >= REINFORCING_GATES.partition_from_step) {
    builder.add('WFB-0880ZP', 2 * N, 'Flat Bar 880 with Plate');
  }

  if (step >= REINFORCING_GATES.tall_from_step) {
    builder.add('WFB-0950Z', builder.clamp('WFB-0950Z', 4 * (perimeter - 1) * (HC - 2)), 'Flat Bar 950');
  }
  if (step >= REINFORCING_GATES.extra_tall_from_step) {
    builder.add('WFB-0950ZL', 2 * joints, 'Flat Bar 950 (Long)');
  }
  builder.add('WFB-1200Z', 2 * joints, 'Flat Bar 1200');

  for (const frame of CORNER_FRAMES_BY_STEP[step] ?? []) {
    builder.merge(frame.part_no, frame.quantity, `Corner Frame ${frame.part_no.slice(4, 8)}mm`);
  }

  if (step >= REINFORCING_GATES.external_plate_from_step) {
    let plate80 = 4 * lengthSpans + 2 * N;
    if (step >= REINFORCING_GATES.tall_from_step) plate80 += 8 * (HC - 2) * (HC - 2);
    if (long && step >= REINFORCING_GATES.extra_tall_from_step) {
      plate80 += Math.trunc(((lengthHalves - 20) * 32) / 20);
    }
    builder.add('WCP-1780Z', plate80, 'Cross Plate 80');
  }

  if (step >= REINFORCING_GATES.tall_from_step) {
    builder.add('WCP-1616Z', builder.clamp('WCP-1616Z', lengthSpans * (long ? 3 : 4) * (HC - 2)), 'Cross Plate 16');
  }
}

export function calculateReinforcing(
  dims: DerivedDimensions,
  internalMaterial: StainlessGrade
): ReinforcingResult {
  const builder = new PartListBuilder('reinforcing', 'External Reinforcing');
  const ctx = contextFor(dims);

  addExternal(builder, ctx);
  addInternal(builder, ctx, internalMaterial);

  return {
    ...builder.build(),
    module: 'reinforcing',
    skid_fixings: skidFixingCount(dims)
  };
}
