/**
 * Tank BOM Calculation Types
 */

// ============================================================================
// INPUT TYPES
// ============================================================================

export interface TankDimensions {
  /** Tank width in meters (half-meter granularity) */
  width: number;

  /** Compartment lengths; length2-4 are 0 when the tank has no partition there */
  length1: number;
  length2: number;
  length3: number;
  length4: number;

  height: number;

  /** Number of identical tanks ordered */
  quantity: number;
}

export type PanelProduct = 'mnt' | 'not_included';

export type InsulationScope = 'none' | 'full' | 'roof' | 'roof_side';

export interface PanelOptions {
  product: PanelProduct;
  insulation: InsulationScope;
  side_1x1: boolean;
  partition_1x1: boolean;
}

export type SkidType = 'default' | 'angle_75' | 'channel_125' | 'channel_150' | 'except';

export type BoltMaterial = 'HDG' | 'SS304' | 'SS316';

export interface BoltSelection {
  label: string;
  /** null when panel assembly bolts are excluded */
  external: BoltMaterial | null;
  /** null when every bolt is excluded */
  internal: BoltMaterial | null;
}

export type StainlessGrade = 'SS316' | 'SS304';

export type TieRodMaterial = 'SS316' | 'SS304' | 'SS304_PET' | 'SS316_PE';

export type TieRodSpec = 'M12' | 'M16';

export interface SteelOptions {
  skid: SkidType;
  bolts: BoltSelection;
  internal_material: StainlessGrade;
  tie_rod_material: TieRodMaterial;
  tie_rod_spec: TieRodSpec;
}

export type LevelIndicator = 'general' | 'sensor' | 'none';

export type InternalLadderMaterial = 'GRP' | 'SS';

export type ExternalLadderMaterial = 'HDG' | 'SS';

export interface AccessoryOptions {
  level_indicator: LevelIndicator;
  internal_ladder: InternalLadderMaterial;
  external_ladder: ExternalLadderMaterial;
  /** null keeps the default count */
  internal_ladder_qty: number | null;
  external_ladder_qty: number | null;
}

export type FittingTypeCode = 'SF' | 'FL' | 'SD' | 'OF' | 'SB' | 'IN' | 'OUT';

export interface FittingSpec {
  type: FittingTypeCode;
  size: number;
  quantity: number;
}

export interface OrderInfo {
  order_no?: string;
  project_name?: string;
  location?: string;
  sales_rep?: string;
  delivery_date?: string;
  payment_terms?: string;
  port_of_discharge?: string;
}

/** Fully decoded request; the engine only ever sees closed variants */
export interface TankConfiguration {
  dimensions: TankDimensions;
  panel_options: PanelOptions;
  steel_options: SteelOptions;
  accessory_options: AccessoryOptions;
  fittings: FittingSpec[];
  exchange_rate: number;
  currency: string;
  order_info?: OrderInfo;
}

// ============================================================================
// DERIVED DIMENSIONS
// ============================================================================

export type Quad = [number, number, number, number];

export interface DerivedDimensions {
  width: number;
  width_int: number;
  width_frac: number;

  lengths: Quad;
  length_ints: Quad;
  length_fracs: Quad;

  height: number;

  /** Height rounded to its half-meter step, e.g. 2.8 -> 3.0 */
  stepped_height: number;
  /** Integer and fractional parts of the stepped height */
  height_int: number;
  height_frac: number;

  /** Nearest half-meter step (2 = 1.0 m, 10 = 5.0 m); ties go to the lower step */
  height_step: number;

  /** height_step clamped to the 1.0-5.0 m range the lookup tables cover */
  table_step: number;

  partition_count: number;

  total_length: number;
  total_length_int: number;
  total_length_frac: number;

  /** Length segments carrying a half meter */
  half_length_segments: number;
  half_width: boolean;

  /** width_int + total_length_int */
  perimeter_int: number;
}

// ============================================================================
// MODULE OUTPUT
// ============================================================================

export type PartCategory =
  | 'Panels'
  | 'Steel Skid'
  | 'Bolts & Nuts'
  | 'External Reinforcing'
  | 'Internal Reinforcing'
  | 'Internal Tie-rod'
  | 'ETC'
  | 'Fittings';

export type ModuleName =
  | 'panels'
  | 'steel_skid'
  | 'reinforcing'
  | 'bolts'
  | 'tie_rods'
  | 'etc'
  | 'fittings';

export interface PartLine {
  part_no: string;
  quantity: number;
  category: PartCategory;
  description: string;
}

export interface ClampEvent {
  module: ModuleName;
  part_no: string;
  raw_quantity: number;
}

export interface ModuleResult {
  module: ModuleName;
  parts: PartLine[];
  clamped: ClampEvent[];
}

export interface ReinforcingResult extends ModuleResult {
  module: 'reinforcing';
  /** External reinforcing fixings on the skid, one M12x40 bolt each */
  skid_fixings: number;
}

export interface TieRodResult extends ModuleResult {
  module: 'tie_rods';
  assemblies: number;
}

// ============================================================================
// RESPONSE TYPES
// ============================================================================

export interface CapacityInfo {
  nominal_capacity_m3: number;
  actual_capacity_m3: number;
  surface_area_m2: number;
  total_length: number;
  num_partitions: number;
}

export interface BOMItem {
  part_no: string;
  part_name: string;
  description: string;
  quantity: number;
  unit_price_usd: number;
  total_price_usd: number;
  weight_kg: number;
  total_weight_kg: number;
  category: PartCategory;
  catalog_found: boolean;
}

export type SummaryKey =
  | 'panels'
  | 'steel_skid'
  | 'bolts_nuts'
  | 'external_reinforcing'
  | 'internal_reinforcing'
  | 'internal_tie_rod'
  | 'etc'
  | 'fittings';

export type CategoryTotals = Record<SummaryKey, number>;

export interface CostSummary extends CategoryTotals {
  total_usd: number;
  total_local: number;
  exchange_rate: number;
  currency: string;
}

export interface WeightSummary {
  by_category: CategoryTotals;
  panels_kg: number;
  steel_kg: number;
  accessories_kg: number;
  total_kg: number;
}

export interface CalculationWarning {
  code: string;
  message: string;
  field?: string;
}

export interface ModuleError {
  module: ModuleName;
  message: string;
}

export interface CalculationDiagnostics {
  clamped: ClampEvent[];
  module_errors: ModuleError[];
  missing_parts: string[];
  warnings: CalculationWarning[];
}

export interface TankCalculationResult {
  success: boolean;
  capacity: CapacityInfo;
  bom: BOMItem[];
  cost_summary: CostSummary;
  weight_summary: WeightSummary;
  diagnostics: CalculationDiagnostics;
  provenance: {
    engine_version: string;
    table_version: string;
  };
  order_info?: OrderInfo;
}

// ============================================================================
// CATALOG TYPES
// ============================================================================

export interface CatalogEntry {
  part_no: string;
  name: string;
  unit_price_usd: number;
  unit_weight_kg: number;
}

export interface ResolvedPart extends CatalogEntry {
  found: boolean;
}

export interface PartsCatalog {
  resolve(partNo: string): ResolvedPart;
}

// ============================================================================
// FITTINGS CATALOG TYPES
// ============================================================================

export interface FittingOption {
  type: FittingTypeCode;
  size: number;
  part_no: string;
  description: string;
}

export interface RecommendedFitting extends FittingSpec {
  part_no: string;
  description: string;
  recommended: true;
}
