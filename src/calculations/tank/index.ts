/**
 * GRP Panel Tank Calculations
 */

export { calculateTank } from './orchestrator';
export { deriveDimensions, heightToStep } from './dimensions';
export { calculatePanels } from './panels';
export { calculateSteelSkid, resolveSkidProfile } from './steel-skid';
export { calculateReinforcing, cornerBracketCount, skidFixingCount } from './reinforcing';
export { calculateBolts } from './bolts';
export { calculateTieRods, rodLengthFor } from './tie-rods';
export { calculateEtc } from './etc';
export {
  calculateFittings,
  listAvailableFittings,
  recommendFittings,
  parseFittingPartNumber
} from './fittings';
export { calculateCapacity, summarizeCost, summarizeWeight } from './summary';
