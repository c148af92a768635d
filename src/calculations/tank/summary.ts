/**
 * Capacity, BOM pricing and cost / weight roll-ups
 */

import {
  BOMItem,
  CapacityInfo,
  CategoryTotals,
  CostSummary,
  DerivedDimensions,
  PartLine,
  PartsCatalog,
  SummaryKey,
  WeightSummary
} from '../../types';
import {
  ACCESSORY_WEIGHT_KEYS,
  CAPACITY,
  CATEGORY_SUMMARY_KEYS,
  STEEL_WEIGHT_KEYS
} from '../../constants';

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function calculateCapacity(dims: DerivedDimensions): CapacityInfo {
  const W = dims.width;
  const L = dims.total_length;
  const H = dims.height;

  const nominal = W * L * H;
  const actual = Math.max(0, W * L * (H - CAPACITY.freeboard_m));
  const surface = 2 * (W * L + W * H + L * H) + W * H * dims.partition_count;

  return {
    nominal_capacity_m3: round2(nominal),
    actual_capacity_m3: round2(actual),
    surface_area_m2: round2(surface),
    total_length: L,
    num_partitions: dims.partition_count
  };
}

/**
 * Scale module lines by the tank count and resolve price / weight from the catalog
 */
export function priceLines(lines: PartLine[], tankCount: number, catalog: PartsCatalog): BOMItem[] {
  return lines.map(line => {
    const part = catalog.resolve(line.part_no);
    const quantity = line.quantity * tankCount;

    return {
      part_no: line.part_no,
      part_name: part.found ? part.name : line.description || line.part_no,
      description: line.description,
      quantity,
      unit_price_usd: part.unit_price_usd,
      total_price_usd: round2(part.unit_price_usd * quantity),
      weight_kg: part.unit_weight_kg,
      total_weight_kg: round2(part.unit_weight_kg * quantity),
      category: line.category,
      catalog_found: part.found
    };
  });
}

function emptyTotals(): CategoryTotals {
  return {
    panels: 0,
    steel_skid: 0,
    bolts_nuts: 0,
    external_reinforcing: 0,
    internal_reinforcing: 0,
    internal_tie_rod: 0,
    etc: 0,
    fittings: 0
  };
}

function totalsBy(bom: BOMItem[], value: (item: BOMItem) => number): { totals: CategoryTotals; grand: number } {
  const totals = emptyTotals();
  let grand = 0;

  for (const item of bom) {
    const key = CATEGORY_SUMMARY_KEYS[item.category];
    totals[key] += value(item);
    grand += value(item);
  }

  for (const key of Object.values(CATEGORY_SUMMARY_KEYS)) {
    totals[key] = round2(totals[key]);
  }

  return { totals, grand };
}

export function summarizeCost(bom: BOMItem[], exchangeRate: number, currency: string): CostSummary {
  const { totals, grand } = totalsBy(bom, item => item.total_price_usd);

  return {
    ...totals,
    total_usd: round2(grand),
    total_local: round2(grand * exchangeRate),
    exchange_rate: exchangeRate,
    currency
  };
}

export function summarizeWeight(bom: BOMItem[]): WeightSummary {
  const { totals, grand } = totalsBy(bom, item => item.total_weight_kg);
  const sum = (keys: SummaryKey[]) => round2(keys.reduce((acc, key) => acc + totals[key], 0));

  return {
    by_category: totals,
    panels_kg: totals.panels,
    steel_kg: sum(STEEL_WEIGHT_KEYS),
    accessories_kg: sum(ACCESSORY_WEIGHT_KEYS),
    total_kg: round2(grand)
  };
}
