/**
 * Tank Calculation Orchestrator
 *
 * Single pass: derive dimensions once, run every module in order, thread the
 * panel and reinforcing results into the modules that read them, scale by the
 * tank count, resolve against the catalog and roll up the summaries.
 * A module that throws is reported and skipped; the rest of the BOM still builds.
 */

import {
  CalculationWarning,
  ModuleError,
  ModuleName,
  ModuleResult,
  PartsCatalog,
  TankCalculationResult,
  TankConfiguration
} from '../../types';
import { ENGINE_VERSION, TABLE_VERSION } from '../../constants';
import { deriveDimensions } from './dimensions';
import { calculatePanels } from './panels';
import { calculateSteelSkid } from './steel-skid';
import { calculateReinforcing } from './reinforcing';
import { calculateBolts } from './bolts';
import { calculateTieRods } from './tie-rods';
import { calculateEtc } from './etc';
import { calculateFittings } from './fittings';
import { calculateCapacity, priceLines, summarizeCost, summarizeWeight } from './summary';

function runModule<T extends ModuleResult>(
  module: ModuleName,
  errors: ModuleError[],
  calculate: () => T
): T | null {
  try {
    return calculate();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${module} calculation failed:`, message);
    errors.push({ module, message });
    return null;
  }
}

export function calculateTank(
  config: TankConfiguration,
  catalog: PartsCatalog,
  warnings: CalculationWarning[] = []
): TankCalculationResult {
  const dims = deriveDimensions(config.dimensions);
  const { panel_options, steel_options, accessory_options } = config;
  const moduleErrors: ModuleError[] = [];
  const diagnosticsWarnings = [...warnings];

  const panels = runModule('panels', moduleErrors, () => calculatePanels(dims, panel_options));
  const skid = runModule('steel_skid', moduleErrors, () => calculateSteelSkid(dims, steel_options.skid));
  const reinforcing = runModule('reinforcing', moduleErrors, () =>
    calculateReinforcing(dims, steel_options.internal_material)
  );
  const bolts = runModule('bolts', moduleErrors, () =>
    calculateBolts(dims, steel_options.bolts, reinforcing ? reinforcing.skid_fixings : null)
  );
  const tieRods = runModule('tie_rods', moduleErrors, () =>
    calculateTieRods(dims, steel_options.tie_rod_material, steel_options.tie_rod_spec)
  );
  const etc = runModule('etc', moduleErrors, () =>
    calculateEtc(dims, accessory_options, { panels, reinforcing })
  );
  const fittings = runModule('fittings', moduleErrors, () => calculateFittings(config.fittings));

  if (!panels || !reinforcing) {
    diagnosticsWarnings.push({
      code: 'TAPE_ESTIMATED',
      message: '50mm sealing tape estimated from dimensions (panel or reinforcing result unavailable)'
    });
  }
  if (!reinforcing && steel_options.bolts.external) {
    diagnosticsWarnings.push({
      code: 'FIXINGS_ESTIMATED',
      message: 'M12x40 bolt count estimated from dimensions (reinforcing result unavailable)'
    });
  }

  const results = [panels, skid, reinforcing, bolts, tieRods, etc, fittings].filter(
    (result): result is ModuleResult => result !== null
  );

  const lines = results.flatMap(result => result.parts);
  const bom = priceLines(lines, config.dimensions.quantity, catalog);
  const missingParts = [...new Set(bom.filter(item => !item.catalog_found).map(item => item.part_no))];

  if (missingParts.length > 0) {
    console.warn(`⚠️ ${missingParts.length} part(s) not found in catalog: ${missingParts.join(', ')}`);
  }

  const result: TankCalculationResult = {
    success: moduleErrors.length === 0,
    capacity: calculateCapacity(dims),
    bom,
    cost_summary: summarizeCost(bom, config.exchange_rate, config.currency),
    weight_summary: summarizeWeight(bom),
    diagnostics: {
      clamped: results.flatMap(r => r.clamped),
      module_errors: moduleErrors,
      missing_parts: missingParts,
      warnings: diagnosticsWarnings
    },
    provenance: {
      engine_version: ENGINE_VERSION,
      table_version: TABLE_VERSION
    }
  };

  if (config.order_info) {
    result.order_info = config.order_info;
  }

  return result;
}
