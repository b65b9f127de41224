import fs from "fs";
import { z } from "zod";
import type { JobSettings, ResolvedRecord, SettingsSnapshot } from "../domain/types.js";
import type { Logger } from "../log/jobLogger.js";

export const CHECKPOINT_SUFFIX = ".checkpoint.json";

const SettingsSchema = z.object({
  input_path: z.string(),
  output_path: z.string(),
  column_mapping: z.object({
    merchant_name: z.string(),
    address: z.string().optional(),
    city: z.string().optional(),
    country: z.string().optional(),
    state: z.string().optional()
  }),
  start_row: z.number().int(),
  end_row: z.number().int(),
  mode: z.enum(["Basic", "Enhanced"]),
  model_name: z.string(),
  budget_per_row: z.number(),
  output_columns: z.array(
    z.object({
      source_field: z.enum(["cleaned_name", "website", "socials", "evidence", "evidence_links", "accumulated_cost", "remarks", "logo_filename"]),
      output_header: z.string(),
      enabled: z.boolean()
    })
  ),
  social_priority: z.array(z.enum(["facebook", "linkedin", "instagram", "twitter"])),
  checkpoint_every: z.number().int().positive()
});

const RecordSchema = z.object({
  cleaned_name: z.string(),
  website: z.string(),
  socials: z.array(z.string()),
  evidence: z.string(),
  evidence_links: z.array(z.string()),
  accumulated_cost: z.number(),
  remarks: z.string(),
  logo_filename: z.string()
});

const CheckpointSchema = z.object({
  last_processed_row: z.number().int(),
  job_settings: SettingsSchema,
  processed_records: z.array(RecordSchema)
});

export type Checkpoint = {
  last_processed_row: number;
  job_settings: JobSettings;
  processed_records: ResolvedRecord[];
};

export function checkpointPathFor(inputPath: string): string {
  return `${inputPath}${CHECKPOINT_SUFFIX}`;
}

export class CheckpointStore {
  readonly path: string;

  constructor(inputPath: string, private readonly logger: Logger) {
    this.path = checkpointPathFor(inputPath);
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  // A checkpoint written for a different input file is ignored; an unreadable one is discarded.
  load(inputPath: string): Checkpoint | null {
    if (!this.exists()) return null;

    let parsed: Checkpoint;
    try {
      const json: unknown = JSON.parse(fs.readFileSync(this.path, "utf8"));
      parsed = CheckpointSchema.parse(json);
    } catch (err) {
      this.logger.warn(`Could not load checkpoint ${this.path}, starting from scratch: ${err instanceof Error ? err.message : String(err)}`);
      this.delete();
      return null;
    }

    if (parsed.job_settings.input_path !== inputPath) {
      this.logger.warn(`Checkpoint ${this.path} belongs to ${parsed.job_settings.input_path}; ignoring it.`);
      return null;
    }
    return parsed;
  }

  // Full rewrite through a temp file so a crash mid-write never leaves a torn checkpoint.
  save(lastProcessedRow: number, settings: SettingsSnapshot, records: readonly ResolvedRecord[]) {
    const data = {
      last_processed_row: lastProcessedRow,
      job_settings: settings,
      processed_records: records.map((r) => RecordSchema.parse(r))
    };
    const tmp = `${this.path}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
    fs.renameSync(tmp, this.path);
    this.logger.info(`Checkpoint saved at row ${lastProcessedRow} (${records.length} records)`);
  }

  delete() {
    if (fs.existsSync(this.path)) {
      fs.rmSync(this.path, { force: true });
      this.logger.info("Checkpoint file cleaned up.");
    }
  }
}
