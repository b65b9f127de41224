// Unit prices per call, in the same currency as JobSettings.budget_per_row.
export type UnitCosts = {
  search: number;
  placesLookup: number;
  // Per language-model call, keyed by model identifier.
  models: Record<string, number>;
  defaultModel: number;
};

export const DEFAULT_UNIT_COSTS: UnitCosts = {
  search: 0.42,
  placesLookup: 2.7,
  models: {
    "gpt-4o-mini": 0.02,
    "gpt-4o": 0.35,
    "gpt-4.1-mini": 0.05,
    "gpt-4.1": 0.3
  },
  defaultModel: 0.1
};

export function modelCost(costs: UnitCosts, modelName: string): number {
  return costs.models[modelName] ?? costs.defaultModel;
}
