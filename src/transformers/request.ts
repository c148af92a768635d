/**
 * Transform API request bodies into the engine's TankConfiguration
 *
 * Bodies are validated with zod; option strings are decoded once into
 * closed variants. Unknown option strings fall back to the documented
 * default and are reported as warnings.
 */

import { z } from 'zod';
import {
  AccessoryOptions,
  BoltSelection,
  CalculationWarning,
  ExternalLadderMaterial,
  FittingSpec,
  InsulationScope,
  InternalLadderMaterial,
  LevelIndicator,
  PanelOptions,
  PanelProduct,
  SkidType,
  StainlessGrade,
  SteelOptions,
  TankConfiguration,
  TankDimensions,
  TieRodMaterial,
  TieRodSpec
} from '../types';
import { AVAILABLE_HEIGHTS, FITTING_TYPES } from '../constants';
import { isFittingType, parseFittingPartNumber } from '../calculations/tank/fittings';

export class ValidationError extends Error {
  constructor(message: string, readonly details: Array<{ path: string; message: string }>) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ============================================================================
// OPTION TABLES (request label -> engine variant)
// ============================================================================

export const PRODUCT_OPTIONS: Record<string, PanelProduct> = {
  'MNT': 'mnt',
  'Not Included': 'not_included'
};

export const INSULATION_OPTIONS: Record<string, InsulationScope> = {
  'Non-Insulated': 'none',
  'Insulated': 'full',
  'Insulated Roof Only': 'roof',
  'Insulated(Roof,Side)': 'roof_side',
  'Non-insulated(Roof Only)': 'none'
};

export const SKID_OPTIONS: Record<string, SkidType> = {
  'Default': 'default',
  'Angle 75': 'angle_75',
  'Channel 125': 'channel_125',
  'Channel 150': 'channel_150',
  'Except SKB': 'except'
};

// Internal bolts are always reported under SS304 codes
export const BOLT_OPTIONS: Record<string, Omit<BoltSelection, 'label'>> = {
  'EXT:HDG/INT:SS304+R/F:HDG': { external: 'HDG', internal: 'SS304' },
  'EXT:HDG/INT:SS304+R/F:SS304': { external: 'HDG', internal: 'SS304' },
  'EXT:SS304/INT:SS316': { external: 'SS304', internal: 'SS304' },
  'EXT:HDG/INT:SS316': { external: 'HDG', internal: 'SS304' },
  'EXT:SS304/INT:SS304': { external: 'SS304', internal: 'SS304' },
  'EXT:SS316/INT:SS316': { external: 'SS304', internal: 'SS304' },
  'Except All Bolts': { external: null, internal: null },
  'Except Panel Assemble Bolts': { external: null, internal: 'SS304' }
};

export const INTERNAL_MATERIAL_OPTIONS: Record<string, StainlessGrade> = {
  'SS316': 'SS316',
  'SS304': 'SS304'
};

export const TIE_ROD_MATERIAL_OPTIONS: Record<string, TieRodMaterial> = {
  'SS316': 'SS316',
  'SS304': 'SS304',
  'SS304+PET coated': 'SS304_PET',
  'SS316+PE Coated': 'SS316_PE'
};

export const TIE_ROD_SPEC_OPTIONS: Record<string, TieRodSpec> = {
  'M12': 'M12',
  'M16': 'M16',
  '3mH_Tie_Rod(1+1)': 'M12',
  '3mH_Tie_Rod(2+1)': 'M12'
};

export const LEVEL_INDICATOR_OPTIONS: Record<string, LevelIndicator> = {
  'General': 'general',
  'Sensor': 'sensor',
  'No needed': 'none'
};

export const INTERNAL_LADDER_OPTIONS: Record<string, InternalLadderMaterial> = {
  'GRP': 'GRP',
  'SS304': 'SS',
  'SS316L': 'SS'
};

export const EXTERNAL_LADDER_OPTIONS: Record<string, ExternalLadderMaterial> = {
  'HDG': 'HDG',
  'SS304': 'SS',
  'SS316': 'SS'
};

export const DEFAULT_BOLT_OPTION = 'EXT:HDG/INT:SS316';

/** Everything GET /options advertises */
export function getInputOptions() {
  return {
    product_types: Object.keys(PRODUCT_OPTIONS),
    insulation_types: Object.keys(INSULATION_OPTIONS),
    steel_skid_types: Object.keys(SKID_OPTIONS),
    internal_materials: Object.keys(INTERNAL_MATERIAL_OPTIONS),
    bolts_nuts_options: Object.keys(BOLT_OPTIONS),
    tie_rod_materials: Object.keys(TIE_ROD_MATERIAL_OPTIONS),
    tie_rod_specs: Object.keys(TIE_ROD_SPEC_OPTIONS),
    level_indicators: Object.keys(LEVEL_INDICATOR_OPTIONS),
    ladder_materials_internal: Object.keys(INTERNAL_LADDER_OPTIONS),
    ladder_materials_external: Object.keys(EXTERNAL_LADDER_OPTIONS),
    fitting_types: Object.keys(FITTING_TYPES),
    available_heights: [...AVAILABLE_HEIGHTS]
  };
}

// ============================================================================
// SCHEMAS
// ============================================================================

export const dimensionsSchema = z.object({
  width: z.number().positive().max(20),
  length1: z.number().positive().max(20),
  length2: z.number().min(0).max(20).default(0),
  length3: z.number().min(0).max(20).default(0),
  length4: z.number().min(0).max(20).default(0),
  height: z.number().positive().max(10),
  quantity: z.number().int().positive().default(1)
});

const panelOptionsSchema = z.object({
  product_type: z.string().default('MNT'),
  insulation: z.string().default('Non-Insulated'),
  use_side_panel_1x1: z.boolean().default(false),
  use_partition_panel_1x1: z.boolean().default(false)
});

const steelOptionsSchema = z.object({
  reinforcing_type: z.string().optional(),
  steel_skid: z.string().default('Default'),
  internal_material: z.string().default('SS316'),
  bolts_nuts: z.string().default(DEFAULT_BOLT_OPTION),
  tie_rod_material: z.string().default('SS316'),
  tie_rod_spec: z.string().default('M12')
});

const ladderQtySchema = z.number().int().min(-1).max(5).default(-1);

const accessoryOptionsSchema = z.object({
  level_indicator: z.string().default('General'),
  internal_ladder_material: z.string().default('GRP'),
  internal_ladder_qty: ladderQtySchema,
  external_ladder_material: z.string().default('HDG'),
  external_ladder_qty: ladderQtySchema
});

const fittingByCodeSchema = z.object({
  fitting_type: z.string().min(1),
  quantity: z.number().int().positive().default(1),
  position: z.string().optional()
});

const fittingByTypeSchema = z.object({
  type: z.string().min(1),
  size: z.number().int().positive(),
  quantity: z.number().int().positive().default(1),
  position: z.string().optional()
});

const orderInfoSchema = z.object({
  order_no: z.string().optional(),
  project_name: z.string().optional(),
  location: z.string().optional(),
  sales_rep: z.string().optional(),
  delivery_date: z.string().optional(),
  payment_terms: z.string().optional(),
  port_of_discharge: z.string().optional()
});

export const tankRequestSchema = z.object({
  order_info: orderInfoSchema.optional(),
  dimensions: dimensionsSchema,
  panel_options: panelOptionsSchema.default({}),
  steel_options: steelOptionsSchema.default({}),
  accessory_options: accessoryOptionsSchema.default({}),
  fittings: z.array(z.union([fittingByCodeSchema, fittingByTypeSchema])).default([]),
  exchange_rate: z.number().positive().optional()
});

export type TankRequestBody = z.infer<typeof tankRequestSchema>;

// ============================================================================
// DECODING
// ============================================================================

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    throw new ValidationError('Invalid request body', details);
  }
  return parsed.data;
}

/**
 * Look up an option label; unknown labels resolve to the default label's variant
 */
export function decodeOption<T>(
  field: string,
  raw: string,
  table: Record<string, T>,
  defaultLabel: string,
  warnings: CalculationWarning[]
): T {
  if (Object.hasOwn(table, raw)) {
    return table[raw];
  }
  console.warn(`⚠️ Unknown ${field} "${raw}" - using "${defaultLabel}"`);
  warnings.push({
    code: 'UNKNOWN_OPTION',
    message: `Unknown value "${raw}", using "${defaultLabel}"`,
    field
  });
  return table[defaultLabel];
}

function decodeFittings(fittings: TankRequestBody['fittings'], warnings: CalculationWarning[]): FittingSpec[] {
  return fittings.map((fitting, i) => {
    const field = `fittings.${i}`;

    if ('fitting_type' in fitting) {
      const parsed = parseFittingPartNumber(fitting.fitting_type);
      if (parsed) {
        return { ...parsed, quantity: fitting.quantity };
      }
      console.warn(`⚠️ Unknown fitting "${fitting.fitting_type}" - using Suction/Drain 50mm`);
      warnings.push({
        code: 'UNKNOWN_FITTING',
        message: `Unknown fitting "${fitting.fitting_type}", using WSD-050A`,
        field
      });
      return { type: 'SD', size: 50, quantity: fitting.quantity };
    }

    const type = fitting.type.toUpperCase();
    if (isFittingType(type)) {
      return { type, size: fitting.size, quantity: fitting.quantity };
    }
    console.warn(`⚠️ Unknown fitting type "${fitting.type}" - using SD`);
    warnings.push({
      code: 'UNKNOWN_FITTING',
      message: `Unknown fitting type "${fitting.type}", using SD`,
      field
    });
    return { type: 'SD', size: fitting.size, quantity: fitting.quantity };
  });
}

export function decodeDimensions(body: unknown): TankDimensions {
  return parseOrThrow(dimensionsSchema, body);
}

export interface DecodeDefaults {
  exchange_rate: number;
  currency: string;
}

export function decodeTankRequest(
  body: unknown,
  defaults: DecodeDefaults
): { config: TankConfiguration; warnings: CalculationWarning[] } {
  const request = parseOrThrow(tankRequestSchema, body);
  const warnings: CalculationWarning[] = [];
  const panel = request.panel_options;
  const steel = request.steel_options;
  const accessory = request.accessory_options;

  const panelOptions: PanelOptions = {
    product: decodeOption('panel_options.product_type', panel.product_type, PRODUCT_OPTIONS, 'MNT', warnings),
    insulation: decodeOption('panel_options.insulation', panel.insulation, INSULATION_OPTIONS, 'Non-Insulated', warnings),
    side_1x1: panel.use_side_panel_1x1,
    partition_1x1: panel.use_partition_panel_1x1
  };

  const boltLabel = Object.hasOwn(BOLT_OPTIONS, steel.bolts_nuts) ? steel.bolts_nuts : DEFAULT_BOLT_OPTION;
  const steelOptions: SteelOptions = {
    skid: decodeOption('steel_options.steel_skid', steel.steel_skid, SKID_OPTIONS, 'Default', warnings),
    bolts: {
      label: boltLabel,
      ...decodeOption('steel_options.bolts_nuts', steel.bolts_nuts, BOLT_OPTIONS, DEFAULT_BOLT_OPTION, warnings)
    },
    internal_material: decodeOption(
      'steel_options.internal_material', steel.internal_material, INTERNAL_MATERIAL_OPTIONS, 'SS316', warnings
    ),
    tie_rod_material: decodeOption(
      'steel_options.tie_rod_material', steel.tie_rod_material, TIE_ROD_MATERIAL_OPTIONS, 'SS316', warnings
    ),
    tie_rod_spec: decodeOption('steel_options.tie_rod_spec', steel.tie_rod_spec, TIE_ROD_SPEC_OPTIONS, 'M12', warnings)
  };

  const accessoryOptions: AccessoryOptions = {
    level_indicator: decodeOption(
      'accessory_options.level_indicator', accessory.level_indicator, LEVEL_INDICATOR_OPTIONS, 'General', warnings
    ),
    internal_ladder: decodeOption(
      'accessory_options.internal_ladder_material', accessory.internal_ladder_material,
      INTERNAL_LADDER_OPTIONS, 'GRP', warnings
    ),
    external_ladder: decodeOption(
      'accessory_options.external_ladder_material', accessory.external_ladder_material,
      EXTERNAL_LADDER_OPTIONS, 'HDG', warnings
    ),
    internal_ladder_qty: accessory.internal_ladder_qty < 0 ? null : accessory.internal_ladder_qty,
    external_ladder_qty: accessory.external_ladder_qty < 0 ? null : accessory.external_ladder_qty
  };

  const config: TankConfiguration = {
    dimensions: request.dimensions,
    panel_options: panelOptions,
    steel_options: steelOptions,
    accessory_options: accessoryOptions,
    fittings: decodeFittings(request.fittings, warnings),
    exchange_rate: request.exchange_rate ?? defaults.exchange_rate,
    currency: defaults.currency
  };

  if (request.order_info) {
    config.order_info = request.order_info;
  }

  return { config, warnings };
}
