/**
 * GRP Panel Tank Calculation Constants
 *
 * Heights are addressed by half-meter step (2 = 1.0 m ... 10 = 5.0 m).
 * Decimal coefficients are stored as integers with an explicit scale.
 */

import { FittingTypeCode, PartCategory, SkidType, SummaryKey } from '../types';

export const ENGINE_VERSION = '1.0.0';

/** Bump whenever a coefficient or lookup value below changes */
export const TABLE_VERSION = '2025.2';

export const MIN_TABLE_STEP = 2;
export const MAX_TABLE_STEP = 10;

export const AVAILABLE_HEIGHTS = [1.0, 1.5, 2.0, 2.5, 3.0, 3.5, 4.0, 4.5, 5.0] as const;

// ============================================================================
// PANELS
// ============================================================================

export const PANEL_SUFFIX_BY_STEP: Record<number, { side: string; bottom: string }> = {
  2: { side: '10S', bottom: '10M' },
  3: { side: '15S', bottom: '15M' },
  4: { side: '20S', bottom: '20M' },
  5: { side: '15T', bottom: '25M' },
  6: { side: '20T', bottom: '30M' },
  7: { side: '15T', bottom: '35M' },
  8: { side: '20T', bottom: '40M' },
  9: { side: '15T', bottom: '45M' },
  10: { side: '20T', bottom: '50M' }
};

export const PANEL_TIERS = {
  /** Side walls split into top/low tiers from 2.5 m */
  multi_tier_from_step: 5,
  /** A mid tier is added from 4.0 m */
  mid_tier_from_step: 8,
  mid_side_part: 'SF30M',
  partition_top_part: 'PL20TCB',
  partition_mid_part: 'SN30M'
} as const;

// ============================================================================
// STEEL SKID
// ============================================================================

export type SkidProfileKey = Exclude<SkidType, 'default' | 'except'>;

export interface SkidProfile {
  label: string;
  long_code: string;
  short_code: string;
  main_connector: string;
  cross_connector: string;
  /** Side frame length (mm) used when the integer width is odd */
  odd_side_frame_mm: number;
  sub_frame_side: string;
  sub_frame_corner: string;
}

export const SKID_PROFILES: Record<SkidProfileKey, SkidProfile> = {
  angle_75: {
    label: '75 Angle',
    long_code: 'AL',
    short_code: 'AS',
    main_connector: 'WBR-7575Z',
    cross_connector: 'WBR-0240Z',
    odd_side_frame_mm: 1570,
    sub_frame_side: 'WFF-0957AMZ',
    sub_frame_corner: 'WFF-1063AMZ'
  },
  channel_125: {
    label: '125 Channel',
    long_code: 'CL',
    short_code: 'CS',
    main_connector: 'WBR-0120Z',
    cross_connector: 'WBR-21590Z',
    odd_side_frame_mm: 1560,
    sub_frame_side: 'WFF-0962AMZ',
    sub_frame_corner: 'WFF-1053AMZ'
  },
  channel_150: {
    label: '150 Channel',
    long_code: 'HCL',
    short_code: 'HCS',
    main_connector: 'WBR-0150Z',
    cross_connector: 'WBR-22310Z',
    odd_side_frame_mm: 1560,
    sub_frame_side: 'WFF-0962AMZ',
    sub_frame_corner: 'WFF-1053AMZ'
  }
};

export const SKID_COEFFICIENTS = {
  /** Default skid selection: height (m) above which the heavier profile applies */
  channel_150_above_m: 4.3,
  channel_125_above_m: 2.5,
  even_side_frame_mm: 2060,
  sub_frame_centre: 'WFF-0994AMZ',
  /** Centre sub-frame factor in thousandths, long tanks vs. the rest */
  centre_factor_long: 726,
  centre_factor: 680,
  /** Liner pieces per m2 in hundredths, by floor area band */
  liner_factor_large: 540,
  liner_factor_medium: 570,
  liner_factor_small: 664,
  liner_large_above_m2: 100,
  liner_medium_above_m2: 50,
  /** Anchors double above this step (3.0 m) */
  anchor_double_above_step: 6
} as const;

// ============================================================================
// BOLTS & NUTS
// ============================================================================

export const BOLT_MATERIAL_CODES = {
  HDG: 'Z',
  SS304: 'SA4',
  SS316: 'SA2'
} as const;

export const BOLT_COEFFICIENTS = {
  m14x40_short_per_height: 32,
  m14x40_tall_base: 96,
  m14x40_tall_per_height: 10,
  /** tenths, per extra meter of length beyond 10 m per partition */
  m14x40_long_partition_tenths: 124,
  m10x35_partition_long: 14,
  m10x35_partition_short: 16,
  m10x50_partition_per_width: 28,
  m10x50_partition_tall_per_width: 21,
  m14x120_base: 32,
  internal_m10x35_tall_tenths: 42,
  internal_m10x50_long_tenths: 36,
  /** tenths per partition width meter: tall vs. short tanks */
  rubber_m10x58_tall_tenths: 144,
  rubber_m10x58_tenths: 128,
  rubber_m14x120_tall_tenths: 180,
  rubber_m14x120_tenths: 108
} as const;

// ============================================================================
// REINFORCING
// ============================================================================

/** Corner bracket (WBR-9090) count by step; shared by internal and external */
export const CORNER_BRACKETS_BY_STEP: Record<number, number> = {
  5: 4,
  6: 4,
  7: 8,
  8: 8,
  9: 8,
  10: 12
};

export const CORNER_FRAMES_BY_STEP: Record<number, Array<{ part_no: string; quantity: number }>> = {
  2: [{ part_no: 'WCF-1000Z', quantity: 4 }],
  3: [{ part_no: 'WCF-1500Z', quantity: 4 }],
  4: [{ part_no: 'WCF-2000Z', quantity: 4 }],
  5: [{ part_no: 'WCF-2500Z', quantity: 4 }],
  6: [{ part_no: 'WCF-1000Z', quantity: 4 }, { part_no: 'WCF-2000Z', quantity: 4 }],
  7: [{ part_no: 'WCF-1000Z', quantity: 4 }, { part_no: 'WCF-2000Z', quantity: 4 }],
  8: [{ part_no: 'WCF-2000Z', quantity: 8 }],
  9: [{ part_no: 'WCF-2000Z', quantity: 8 }],
  10: [{ part_no: 'WCF-2000Z', quantity: 12 }]
};

/** External reinforcing fixings on the skid per meter of W + L */
export const SKID_FIXINGS_PER_METER = 4;

export const REINFORCING_GATES = {
  internal_from_step: 4,
  internal_bracket_from_step: 5,
  tall_from_step: 6,
  extra_tall_from_step: 8,
  partition_from_step: 5,
  external_plate_from_step: 4
} as const;

/** Partition reinforcing quantities per partition-width meter, in tenths */
export const PARTITION_REINFORCING_TENTHS = {
  'WCP-1616': { tall: 18, short: 9 },
  'WCP-1780': { tall: 9, short: 9 },
  'WFB-0880': { tall: 9, short: 9 },
  'WFB-0880P': { tall: 11, short: 11 },
  'WFB-0950': { tall: 49, short: 20 },
  'WFB-0950P': { tall: 21, short: 0 },
  'WFB-1200': { tall: 9, short: 9 }
} as const;

// ============================================================================
// TIE RODS
// ============================================================================

export const TIE_ROD_TIERS_BY_STEP: Record<number, number> = {
  2: 0,
  3: 0,
  4: 1,
  5: 2,
  6: 3,
  7: 3,
  8: 5,
  9: 5,
  10: 7
};

export const TIE_ROD = {
  /** Wall clearance subtracted from a span (mm) */
  clearance_mm: 120,
  segment_mm: 4000,
  /** Widths above this need 4000 mm segments joined by connectors */
  single_span_max_m: 5,
  /** Compartments at least this long take 2880 + 1880 mm rods */
  large_compartment_m: 5,
  large_compartment_long_rod_mm: 2880,
  large_compartment_short_rod_mm: 1880,
  /** A first compartment whose rod comes out at this length adds no rods */
  full_compartment_rod_mm: 4880,
  rods_per_position: 2,
  /** Rows per position along a compartment on a wide tank */
  compartment_rows: 3,
  nuts_per_assembly: 4,
  washers_per_assembly: 4,
  /** Partition segments per tier: (4565 x tiers - 8525) / 1000 */
  partition_segment_slope: 4565,
  partition_segment_offset: 8525,
  /** Assemblies per partition per tier with large compartments, in tenths */
  large_partition_assembly_tenths: 49,
  mixed_partition_assemblies: 4
} as const;

/** Standard rod lengths (mm), ascending */
export const TIE_ROD_STANDARD_LENGTHS_MM = [
  1880, 2280, 2380, 2780, 2880,
  3280, 3380, 3780, 3880,
  4000, 4280, 4380, 4780, 4880,
  5000
] as const;

// ============================================================================
// ETC
// ============================================================================

export const ETC_COEFFICIENTS = {
  large_vent_from_m3: 100,
  vent_area_per_unit_m2: 30,
  roof_support_area_m2: 4,
  /** Partitioned tanks: one supporter per 5 m2 of integer roof area */
  partitioned_roof_support_area_m2: 5,
  long_tank_m: 10,
  long_tank_extra_supporters: 2,
  /** Silicon tubes per 10 m2 of footprint */
  silicon_area_per_tube_m2: 10,
  tape_mm_per_meter: 1000
} as const;

/** 50 mm sealing tape per panel, by panel part-number prefix (mm) */
export const TAPE_MM_BY_PANEL_PREFIX: Record<string, number> = {
  RF: 3000,
  BF: 3000,
  MF: 3000,
  DN: 3000,
  SL: 6500,
  SF: 4000,
  PL: 3000,
  PF: 3000,
  SN: 2500,
  RH: 2250,
  BH: 2250,
  SH: 3000,
  RQ: 1500,
  BQ: 1500
};

/** 50 mm sealing tape per reinforcing part (mm) */
export const TAPE_MM_BY_REINFORCING_PART: Record<string, number> = {
  'WCF-1000Z': 1000,
  'WCF-1500Z': 1000,
  'WCF-2000Z': 1000,
  'WCF-2500Z': 1000,
  'WFB-0950Z': 500,
  'WFB-0950ZL': 650
};

// ============================================================================
// FITTINGS
// ============================================================================

export const FITTING_TYPES: Record<FittingTypeCode, { prefix: string; description: string; sizes: number[] }> = {
  SF: { prefix: 'WSF', description: 'Slant Flange', sizes: [65, 80, 100, 125, 150] },
  FL: { prefix: 'WFL', description: 'Flat Flange', sizes: [65, 80, 100, 125, 150, 200] },
  SD: { prefix: 'WSD', description: 'Suction/Drain', sizes: [50, 65, 80, 100, 125, 150] },
  OF: { prefix: 'WOF', description: 'Overflow', sizes: [50, 65, 80, 100, 125, 150] },
  SB: { prefix: 'WSB', description: 'Socket Brass', sizes: [20, 25, 40, 50] },
  IN: { prefix: 'WIN', description: 'Inlet', sizes: [50, 65, 80, 100, 125, 150] },
  OUT: { prefix: 'WOT', description: 'Outlet', sizes: [50, 65, 80, 100, 125, 150] }
};

/** Upper capacity bound (m3, exclusive) -> size (mm); the last entry covers the rest */
export const RECOMMENDED_FITTING_SIZES = {
  drain: [[10, 40], [50, 50], [100, 65], [200, 80], [500, 100], [Infinity, 150]],
  overflow: [[10, 50], [50, 65], [100, 80], [200, 100], [500, 125], [Infinity, 150]],
  flange: [[20, 50], [50, 65], [100, 80], [200, 100], [500, 125], [Infinity, 150]]
} as const;

// ============================================================================
// SUMMARIES
// ============================================================================

export const CATEGORY_SUMMARY_KEYS: Record<PartCategory, SummaryKey> = {
  'Panels': 'panels',
  'Steel Skid': 'steel_skid',
  'Bolts & Nuts': 'bolts_nuts',
  'External Reinforcing': 'external_reinforcing',
  'Internal Reinforcing': 'internal_reinforcing',
  'Internal Tie-rod': 'internal_tie_rod',
  'ETC': 'etc',
  'Fittings': 'fittings'
};

export const STEEL_WEIGHT_KEYS: SummaryKey[] = [
  'steel_skid',
  'bolts_nuts',
  'external_reinforcing',
  'internal_reinforcing',
  'internal_tie_rod'
];

export const ACCESSORY_WEIGHT_KEYS: SummaryKey[] = ['etc', 'fittings'];

export const CAPACITY = {
  /** Freeboard subtracted from the height for the usable volume (m) */
  freeboard_m: 0.2
} as const;
