import { modelCost, type UnitCosts } from "../config/costs.js";
import type { ProcessingMode } from "../domain/types.js";

// Rough per-row figure: one cleaning call, one search, one extraction and one
// verification. Rows that cascade through several queries cost more.
export function estimateCost(numRows: number, mode: ProcessingMode, modelName: string, costs: UnitCosts): number {
  if (numRows <= 0) return 0;

  let perRow = costs.search + 3 * modelCost(costs, modelName);
  if (mode === "Enhanced") perRow += costs.placesLookup;
  return numRows * perRow;
}

export function withinBudget(estimatedCost: number, numRows: number, budgetPerRow: number): boolean {
  if (numRows <= 0) return true;
  return estimatedCost / numRows <= budgetPerRow;
}
