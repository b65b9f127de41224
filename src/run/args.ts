import path from "path";
import { DEFAULT_SOCIAL_PRIORITY, defaultOutputColumns, type JobSettings, type ProcessingMode, type SocialPlatform } from "../domain/types.js";
import { env } from "../config/env.js";

export function argValue(name: string, argv: string[] = process.argv): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function hasFlag(name: string, argv: string[] = process.argv): boolean {
  return argv.includes(name);
}

function parseMode(v: string | undefined): ProcessingMode {
  if (!v || v.toLowerCase() === "basic") return "Basic";
  if (v.toLowerCase() === "enhanced") return "Enhanced";
  throw new Error(`Unknown --mode ${v} (expected Basic or Enhanced)`);
}

function parsePriority(v: string | undefined): SocialPlatform[] {
  if (!v) return [...DEFAULT_SOCIAL_PRIORITY];
  return v.split(",").map((p) => {
    const t = p.trim().toLowerCase();
    const platform = DEFAULT_SOCIAL_PRIORITY.find((known) => known === t);
    if (!platform) throw new Error(`Unknown social platform in --socialPriority: ${p}`);
    return platform;
  });
}

export const USAGE =
  "Usage: npm run process -- <input.csv> --end <row> [--start 2] [--output out.csv] [--name <column>] " +
  "[--address <column>] [--city <column>] [--country <column>] [--state <column>] [--mode Basic|Enhanced] " +
  "[--model <id>] [--budget <per row>] [--socialPriority facebook,linkedin,instagram,twitter] [--mock]";

export function settingsFromArgs(argv: string[] = process.argv): JobSettings {
  const input = argv[2];
  if (!input || input.startsWith("--")) throw new Error(USAGE);
  const end = argValue("--end", argv);
  if (!end) throw new Error(USAGE);

  const inputPath = path.resolve(input);
  const parsed = path.parse(inputPath);

  return {
    input_path: inputPath,
    output_path: path.resolve(argValue("--output", argv) || path.join(parsed.dir, `${parsed.name}_resolved.csv`)),
    column_mapping: {
      merchant_name: argValue("--name", argv) || "Merchant Name",
      address: argValue("--address", argv),
      city: argValue("--city", argv),
      country: argValue("--country", argv),
      state: argValue("--state", argv)
    },
    start_row: parseInt(argValue("--start", argv) || "2", 10),
    end_row: parseInt(end, 10),
    mode: parseMode(argValue("--mode", argv)),
    model_name: argValue("--model", argv) || env.OPENAI_MODEL,
    budget_per_row: parseFloat(argValue("--budget", argv) || "3"),
    output_columns: defaultOutputColumns(),
    social_priority: parsePriority(argValue("--socialPriority", argv)),
    checkpoint_every: env.CHECKPOINT_EVERY
  };
}
