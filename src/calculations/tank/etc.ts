/**
 * ETC (Miscellaneous) Calculations
 * Air vents, roof supporters, ladders, silicon, level indicators and sealing tape.
 *
 * The 50 mm tape is measured from the panel and reinforcing results; the
 * dimension-only estimate is used only when one of those is missing.
 */

import { AccessoryOptions, DerivedDimensions, ModuleResult, PartLine } from '../../types';
import {
  ETC_COEFFICIENTS,
  TAPE_MM_BY_PANEL_PREFIX,
  TAPE_MM_BY_REINFORCING_PART
} from '../../constants';
import { footprintQuarters, stepToHeight } from './dimensions';
import { PartListBuilder } from './builder';

export interface EtcInputs {
  panels: ModuleResult | null;
  reinforcing: ModuleResult | null;
}

/** Height in mm as used in part numbers, e.g. 3.0 -> "3000"; callers pass the stepped height */
function heightMm(height: number): string {
  return String(Math.round(height * 1000)).padStart(4, '0');
}

/**
 * One vent per compartment, or one per 30 m2 of roof when that is more
 */
export function airVentQuantity(dims: DerivedDimensions): number {
  const byArea = Math.ceil(footprintQuarters(dims) / (4 * ETC_COEFFICIENTS.vent_area_per_unit_m2));
  return Math.max(dims.partition_count + 1, byArea);
}

/**
 * Roof supporters. Partitioned tanks go by integer roof area, a single
 * compartment by its inner roof area rounded up.
 */
export function roofSupporterQuantity(dims: DerivedDimensions): number {
  if (dims.partition_count > 0) {
    const byArea = Math.trunc((dims.width_int * dims.total_length_int) / ETC_COEFFICIENTS.partitioned_roof_support_area_m2);
    const extra = dims.total_length > ETC_COEFFICIENTS.long_tank_m ? ETC_COEFFICIENTS.long_tank_extra_supporters : 0;
    return byArea + extra;
  }

  const length = dims.lengths[0];
  if (length <= 1) return 0;
  // (W - 1) x (L - 1) in quarter square meters
  const inner = (Math.round(dims.width * 2) - 2) * (Math.round(length * 2) - 2);
  return Math.max(0, Math.ceil(inner / (4 * ETC_COEFFICIENTS.roof_support_area_m2)));
}

export function siliconQuantity(dims: DerivedDimensions): number {
  // 10% of the footprint, with the footprint in quarter square meters
  return Math.max(1, Math.ceil(footprintQuarters(dims) / (4 * ETC_COEFFICIENTS.silicon_area_per_tube_m2)));
}

/**
 * 50 mm tape in mm from actual panel and reinforcing quantities
 */
export function tapeFromParts(panels: PartLine[], reinforcing: PartLine[]): number {
  let mm = 0;
  for (const line of panels) {
    mm += (TAPE_MM_BY_PANEL_PREFIX[line.part_no.slice(0, 2)] ?? 0) * line.quantity;
  }
  for (const line of reinforcing) {
    mm += (TAPE_MM_BY_REINFORCING_PART[line.part_no] ?? 0) * line.quantity;
  }
  return mm;
}

/**
 * Dimension-only estimate of the 50 mm tape in meters
 */
export function tapeFromDimensions(dims: DerivedDimensions): number {
  const W = dims.width_int;
  const L = dims.total_length_int;
  const HC = dims.height_int;
  const tall = dims.height_step >= 8;

  if (dims.partition_count > 0) {
    let meters = W * L * 6 + (W + L) * HC * 10;
    if (dims.total_length > 10 && tall) {
      meters += Math.trunc(((Math.round(dims.total_length * 2) - 20) * 29) / 10);
    }
    return meters;
  }

  let meters = 8 * (W + L) + (4 * W * L + 2) * HC;
  if (tall) {
    meters += (W + L - 3) * (HC - 3);
  }
  return meters;
}

export function calculateEtc(
  dims: DerivedDimensions,
  options: AccessoryOptions,
  inputs: EtcInputs
): ModuleResult {
  const builder = new PartListBuilder('etc', 'ETC');
  const N = dims.partition_count;
  const hmm = heightMm(stepToHeight(dims.table_step));
  const nominalCapacity = dims.width * dims.total_length * dims.stepped_height;

  const largeVent = nominalCapacity >= ETC_COEFFICIENTS.large_vent_from_m3;
  builder.add(
    largeVent ? 'WAV-0100A' : 'WAV-0050A',
    airVentQuantity(dims),
    largeVent ? 'Air Vent 100mm' : 'Air Vent 50mm'
  );

  builder.add(`WRS-${hmm}F`, roofSupporterQuantity(dims), `Roof Supporter ${hmm}mm`);

  const internalSuffix = options.internal_ladder === 'GRP' ? 'FI' : 'SI';
  const externalSuffix = options.external_ladder === 'HDG' ? 'ZO' : 'SO';
  builder
    .add(`WLD-${hmm}${internalSuffix}`, options.internal_ladder_qty ?? N + 1, `Internal Ladder ${hmm}mm`)
    .add(`WLD-${hmm}${externalSuffix}`, options.external_ladder_qty ?? 1, `External Ladder ${hmm}mm`);

  builder.add('Silicon', siliconQuantity(dims), 'Silicon Sealant (Tubes)');

  switch (options.level_indicator) {
    case 'general':
      builder.add(`WLV-${hmm}SET(G)`, N + 1, `Level Indicator Glass Type ${hmm}mm`);
      break;
    case 'sensor':
      builder.add('WLV-0000SET(S)', N + 1, 'Level Indicator Sensor Type');
      break;
    case 'none':
      break;
  }

  let tapeMeters: number;
  if (inputs.panels && inputs.reinforcing) {
    tapeMeters = Math.ceil(tapeFromParts(inputs.panels.parts, inputs.reinforcing.parts) / ETC_COEFFICIENTS.tape_mm_per_meter);
  } else {
    tapeMeters = tapeFromDimensions(dims);
  }
  builder.add('WST-0050RO', Math.max(1, tapeMeters), 'Sealing Tape 50mm (Meters)');

  builder.add('WST-0120RO', Math.trunc(4 * dims.stepped_height + 1), 'Sealing Tape 120mm (Roll)');

  return builder.build();
}
