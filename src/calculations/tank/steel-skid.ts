/**
 * Steel Skid Calculations
 * Base frame under the tank: connectors, main beams along the length,
 * width frames, sub-frames, liner and anchor brackets.
 */

import { DerivedDimensions, ModuleResult, SkidType } from '../../types';
import { SKID_COEFFICIENTS, SKID_PROFILES, SkidProfile, SkidProfileKey } from '../../constants';
import { footprintQuarters } from './dimensions';
import { PartListBuilder } from './builder';

/**
 * Resolve the profile for a skid selection. Default picks by height;
 * 'except' means no skid at all.
 */
export function resolveSkidProfile(skid: SkidType, height: number): SkidProfileKey | null {
  switch (skid) {
    case 'except':
      return null;
    case 'angle_75':
    case 'channel_125':
    case 'channel_150':
      return skid;
    case 'default':
      if (height > SKID_COEFFICIENTS.channel_150_above_m) return 'channel_150';
      if (height > SKID_COEFFICIENTS.channel_125_above_m) return 'channel_125';
      return 'angle_75';
  }
}

/**
 * Centre pieces in each width-frame row, by width parity
 */
function widthFrameCentrePieces(widthInt: number): number {
  const pieces = widthInt % 2 === 0 ? (widthInt - 4) / 2 : (widthInt - 3) / 2;
  return Math.max(0, pieces);
}

function addWidthFrames(builder: PartListBuilder, profile: SkidProfile, W: number): void {
  const centreNo = `WFF-2000${profile.short_code}Z`;

  if (W >= 3) {
    const rows = 2;
    const sideMm = W % 2 === 0 ? SKID_COEFFICIENTS.even_side_frame_mm : profile.odd_side_frame_mm;
    builder
      .add(centreNo, rows * widthFrameCentrePieces(W), 'Steel Skid(Main-W)')
      .add(`WFF-${sideMm}${profile.short_code}ZR`, rows, 'Steel Skid(Main-W)')
      .add(`WFF-${sideMm}${profile.short_code}ZL`, rows, 'Steel Skid(Main-W)');
  } else if (W === 2) {
    builder.add(centreNo, 2, 'Steel Skid(Main-W)');
  }
}

export function calculateSteelSkid(dims: DerivedDimensions, skid: SkidType): ModuleResult {
  const builder = new PartListBuilder('steel_skid', 'Steel Skid');
  const profileKey = resolveSkidProfile(skid, dims.stepped_height);

  if (!profileKey) {
    return builder.build();
  }

  const profile = SKID_PROFILES[profileKey];
  const W = dims.width_int;
  const L = dims.total_length_int;
  const widthO = dims.width;
  const lengthO = dims.total_length;
  const large = widthO > 5 || lengthO > 5;

  // Connectors
  builder
    .add(profile.main_connector, 2 * W + 2 + (dims.half_width ? 1 : 0), 'Steel Skid Connector')
    .add(profile.cross_connector, large ? 8 : 4, 'Steel Skid Connector');

  // Main beams along the length: 2 m pieces, plus a 1 m piece for an odd length
  builder
    .add(`WFF-1990${profile.long_code}Z`, Math.floor(L / 2) * (W + 1), 'Steel Skid(Main-L)')
    .add(`WFF-0990${profile.long_code}Z`, (L % 2) * (W + 1), 'Steel Skid(Main-L)');

  addWidthFrames(builder, profile, W);

  // Sub-frames
  let subSide: number;
  if (widthO > 5) {
    subSide = (W - 3) * 2 * (lengthO > 10 ? 2 : 1);
  } else {
    subSide = (W - 1) * 2;
  }
  builder.add(profile.sub_frame_side, builder.clamp(profile.sub_frame_side, subSide), 'Steel Skid(Sub)');

  let subCorner = 4;
  if (lengthO > 10) {
    subCorner += Math.ceil(lengthO / 1.5);
  } else if (lengthO > 5) {
    subCorner += Math.ceil(lengthO / 3);
  }
  builder.add(profile.sub_frame_corner, subCorner, 'Steel Skid(Sub)');

  const centreNo = SKID_COEFFICIENTS.sub_frame_centre;
  let subCentre: number;
  if (large) {
    const factor = lengthO > 10 ? SKID_COEFFICIENTS.centre_factor_long : SKID_COEFFICIENTS.centre_factor;
    // (W - 1) x L_O x factor, with L_O in half meters and factor in thousandths
    subCentre = Math.round(((W - 1) * Math.round(lengthO * 2) * factor) / 2000);
  } else {
    subCentre = (W - 1) * 2;
  }
  builder.add(centreNo, builder.clamp(centreNo, subCentre), 'Steel Skid(Sub)');

  builder.add('LNR-3.0T', linerQuantity(dims), 'Liner');

  const anchors = Math.floor(widthO + lengthO);
  const doubled = dims.height_step > SKID_COEFFICIENTS.anchor_double_above_step;
  builder.add('WBR-5010Z', doubled ? anchors * 2 : anchors, 'Anchor Bracket with bolt and nut set');

  return builder.build();
}

/**
 * Liner pieces: floor area x a per-area factor that drops for larger floors
 */
export function linerQuantity(dims: DerivedDimensions): number {
  const quarters = footprintQuarters(dims);
  const area = quarters / 4;
  let factor: number = SKID_COEFFICIENTS.liner_factor_small;
  if (area > SKID_COEFFICIENTS.liner_large_above_m2) {
    factor = SKID_COEFFICIENTS.liner_factor_large;
  } else if (area > SKID_COEFFICIENTS.liner_medium_above_m2) {
    factor = SKID_COEFFICIENTS.liner_factor_medium;
  }
  return Math.floor((quarters * factor) / 400);
}
