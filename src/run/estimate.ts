import { estimateCost, withinBudget } from "../jobs/costEstimator.js";
import { DEFAULT_UNIT_COSTS } from "../config/costs.js";
import { settingsFromArgs } from "./args.js";

async function main() {
  const s = settingsFromArgs();
  const rows = Math.max(0, s.end_row - s.start_row + 1);
  const total = estimateCost(rows, s.mode, s.model_name, DEFAULT_UNIT_COSTS);

  console.log(`Rows ${s.start_row}-${s.end_row} (${rows}), mode ${s.mode}, model ${s.model_name}`);
  console.log(`Estimated cost: ${total.toFixed(2)} (${rows ? (total / rows).toFixed(2) : "0.00"} per row)`);
  if (!withinBudget(total, rows, s.budget_per_row)) {
    console.log(`Warning: estimate exceeds the budget of ${s.budget_per_row.toFixed(2)} per row.`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
