import path from "path";
import { CheckpointStore } from "../jobs/checkpoint.js";
import { createJobLogger } from "../log/jobLogger.js";

async function main() {
  const input = process.argv[2];
  if (!input) throw new Error("Usage: npm run reset-checkpoint -- <input.csv>");

  const store = new CheckpointStore(path.resolve(input), createJobLogger("reset"));
  if (!store.exists()) {
    console.log(`No checkpoint at ${store.path}`);
    return;
  }
  store.delete();
  console.log("  Next run will start from the configured start row.");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
