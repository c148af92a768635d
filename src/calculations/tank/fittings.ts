/**
 * Fittings
 * Maps (type, size, quantity) selections to part numbers, and suggests a
 * standard set of fittings for a tank size.
 */

import {
  DerivedDimensions,
  FittingOption,
  FittingSpec,
  FittingTypeCode,
  ModuleResult,
  RecommendedFitting
} from '../../types';
import { FITTING_TYPES, RECOMMENDED_FITTING_SIZES } from '../../constants';
import { PartListBuilder } from './builder';

const FITTING_TYPE_CODES = Object.keys(FITTING_TYPES).filter(
  (code): code is FittingTypeCode => code in FITTING_TYPES
);

export function isFittingType(code: string): code is FittingTypeCode {
  return FITTING_TYPE_CODES.some(type => type === code);
}

/** e.g. ('FL', 100) -> 'WFL-100A' */
export function fittingPartNumber(type: FittingTypeCode, size: number): string {
  return `${FITTING_TYPES[type].prefix}-${String(size).padStart(3, '0')}A`;
}

export function fittingDescription(type: FittingTypeCode, size: number): string {
  return `${FITTING_TYPES[type].description} ${size}mm`;
}

/**
 * Parse a fitting part number such as "WSD-050A" back into type and size
 */
export function parseFittingPartNumber(partNo: string): { type: FittingTypeCode; size: number } | null {
  const match = /^([A-Z]{3})-(\d{2,3})A$/.exec(partNo.trim().toUpperCase());
  if (!match) return null;

  const type = FITTING_TYPE_CODES.find(code => FITTING_TYPES[code].prefix === match[1]);
  if (!type) return null;

  return { type, size: Number(match[2]) };
}

export function calculateFittings(fittings: FittingSpec[]): ModuleResult {
  const builder = new PartListBuilder('fittings', 'Fittings');

  for (const fitting of fittings) {
    builder.merge(
      fittingPartNumber(fitting.type, fitting.size),
      fitting.quantity,
      fittingDescription(fitting.type, fitting.size)
    );
  }

  return builder.build();
}

export function listAvailableFittings(): FittingOption[] {
  return FITTING_TYPE_CODES.flatMap(type =>
    FITTING_TYPES[type].sizes.map(size => ({
      type,
      size,
      part_no: fittingPartNumber(type, size),
      description: fittingDescription(type, size)
    }))
  );
}

function sizeFor(table: ReadonlyArray<readonly [number, number]>, capacity: number): number {
  for (const [below, size] of table) {
    if (capacity < below) return size;
  }
  return table[table.length - 1][1];
}

/**
 * Drain and overflow per compartment, plus an inlet/outlet flange pair,
 * sized by nominal capacity
 */
export function recommendFittings(dims: DerivedDimensions): RecommendedFitting[] {
  const capacity = dims.width * dims.total_length * dims.height;
  const sections = dims.partition_count + 1;

  const picks: Array<{ type: FittingTypeCode; size: number; quantity: number; label: string }> = [
    { type: 'SD', size: sizeFor(RECOMMENDED_FITTING_SIZES.drain, capacity), quantity: sections, label: 'Drain' },
    { type: 'SF', size: sizeFor(RECOMMENDED_FITTING_SIZES.overflow, capacity), quantity: sections, label: 'Overflow' },
    { type: 'FL', size: sizeFor(RECOMMENDED_FITTING_SIZES.flange, capacity), quantity: 2, label: 'Flange' }
  ];

  return picks.map((pick): RecommendedFitting => ({
    type: pick.type,
    size: pick.size,
    quantity: pick.quantity,
    part_no: fittingPartNumber(pick.type, pick.size),
    description: `${pick.label} ${pick.size}mm`,
    recommended: true
  }));
}
