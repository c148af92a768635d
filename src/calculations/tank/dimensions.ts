/**
 * Dimension Normalizer
 * Splits raw dimensions into integer / fractional meters (truncation toward zero)
 * and derives the shared quantities every module reads.
 */

import { DerivedDimensions, Quad, TankDimensions } from '../../types';
import { MAX_TABLE_STEP, MIN_TABLE_STEP } from '../../constants';

/**
 * Nearest half-meter step for a height; a height exactly between two steps
 * resolves to the lower one.
 */
export function heightToStep(height: number): number {
  return Math.max(0, Math.ceil(height * 2 - 0.5));
}

export function clampTableStep(step: number): number {
  return Math.min(MAX_TABLE_STEP, Math.max(MIN_TABLE_STEP, step));
}

/** Step back to meters, e.g. 7 -> 3.5 */
export function stepToHeight(step: number): number {
  return step / 2;
}

export function deriveDimensions(dimensions: TankDimensions): DerivedDimensions {
  const lengths: Quad = [
    dimensions.length1,
    dimensions.length2 || 0,
    dimensions.length3 || 0,
    dimensions.length4 || 0
  ];
  const lengthInts: Quad = [
    Math.trunc(lengths[0]),
    Math.trunc(lengths[1]),
    Math.trunc(lengths[2]),
    Math.trunc(lengths[3])
  ];
  const lengthFracs: Quad = [
    lengths[0] - lengthInts[0],
    lengths[1] - lengthInts[1],
    lengths[2] - lengthInts[2],
    lengths[3] - lengthInts[3]
  ];

  const widthInt = Math.trunc(dimensions.width);
  const widthFrac = dimensions.width - widthInt;
  const heightStep = heightToStep(dimensions.height);
  // formulas read the stepped height so a tank between steps matches its tier
  const steppedHeight = stepToHeight(heightStep);
  const heightInt = Math.trunc(steppedHeight);

  const partitionCount = lengths.slice(1).filter(l => l > 0).length;
  const totalLengthInt = lengthInts[0] + lengthInts[1] + lengthInts[2] + lengthInts[3];

  return {
    width: dimensions.width,
    width_int: widthInt,
    width_frac: widthFrac,
    lengths,
    length_ints: lengthInts,
    length_fracs: lengthFracs,
    height: dimensions.height,
    stepped_height: steppedHeight,
    height_int: heightInt,
    height_frac: steppedHeight - heightInt,
    height_step: heightStep,
    table_step: clampTableStep(heightStep),
    partition_count: partitionCount,
    total_length: lengths[0] + lengths[1] + lengths[2] + lengths[3],
    total_length_int: totalLengthInt,
    total_length_frac: lengthFracs[0] + lengthFracs[1] + lengthFracs[2] + lengthFracs[3],
    half_length_segments: lengthFracs.filter(f => f > 0).length,
    half_width: widthFrac > 0,
    perimeter_int: widthInt + totalLengthInt
  };
}

/** Footprint in quarter square meters: (2W)(2L), exact for half-meter inputs */
export function footprintQuarters(dims: DerivedDimensions): number {
  return Math.round(dims.width * 2) * Math.round(dims.total_length * 2);
}
