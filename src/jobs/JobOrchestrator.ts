import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import {
  REMARK_FATAL_PREFIX,
  snapshotSettings,
  type JobSettings,
  type RawRecord,
  type ResolvedRecord,
  type SettingsSnapshot
} from "../domain/types.js";
import { missingCredentials, type Capabilities } from "../domain/capabilities.js";
import { IdentityResolver } from "../domain/identityResolver.js";
import { MappedColumnsAdapter } from "../adapters/MappedColumnsAdapter.js";
import { CheckpointStore } from "./checkpoint.js";
import { PauseGate } from "./pauseGate.js";
import { lastSheetRow, readTable, sheetRowToIndex, writeTable, type Table } from "./table.js";
import { reconcileTable } from "./reconcile.js";
import { estimateCost, withinBudget } from "./costEstimator.js";
import { DEFAULT_UNIT_COSTS, type UnitCosts } from "../config/costs.js";
import { resilientCapabilities } from "../resilience/resilientCapabilities.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../resilience/retry.js";
import { OutputWriteError, PreflightError, RowProcessingError, errorMessage } from "../resilience/errors.js";
import { createJobLogger, type Logger } from "../log/jobLogger.js";

export type StatusCallback = (processed: number, total: number, message: string) => void;
export type CompletionCallback = (message: string) => void;

export const COMPLETED = "Completed Successfully";
export const STOPPED = "Stopped";

export type OrchestratorDeps = {
  // Raw ports; the orchestrator wraps them with the retry policy.
  caps: Capabilities;
  onStatus: StatusCallback;
  onCompletion: CompletionCallback;
  costs?: UnitCosts;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export class JobOrchestrator {
  readonly jobId = uuidv4();
  private settings: SettingsSnapshot;
  private readonly logger: Logger;
  private readonly checkpoints: CheckpointStore;
  private readonly costs: UnitCosts;
  private readonly gate = new PauseGate();

  private running = false;
  private stopped = false;
  private worker: Promise<void> | undefined;

  // Job state. Only touched synchronously, so no update ever interleaves with another.
  private records: ResolvedRecord[] = [];
  private restoredCount = 0;
  private lastCompletedRow = 0;

  constructor(settings: JobSettings, private readonly deps: OrchestratorDeps) {
    this.settings = snapshotSettings(settings);
    this.logger = deps.logger ?? createJobLogger(`job ${this.jobId.slice(0, 8)}`);
    this.costs = deps.costs ?? DEFAULT_UNIT_COSTS;
    this.checkpoints = new CheckpointStore(settings.input_path, this.logger);
  }

  start(): void {
    if (this.running) return;
    this.preflight();

    this.running = true;
    this.stopped = false;
    this.gate.resume();
    this.worker = this.run(this.settings).catch((err) => {
      this.running = false;
      this.logger.error(`Completion callback threw: ${errorMessage(err)}`);
    });
  }

  pause() {
    if (!this.running) return;
    this.gate.pause();
    this.logger.info("Pause requested; waiting at the next row boundary.");
  }

  resume() {
    this.gate.resume();
  }

  stop() {
    this.stopped = true;
    // A paused worker must wake up to notice the stop.
    this.gate.resume();
  }

  isRunning(): boolean {
    return this.running;
  }

  // Settles after the completion callback has fired.
  done(): Promise<void> {
    return this.worker ?? Promise.resolve();
  }

  results(): readonly ResolvedRecord[] {
    return [...this.records];
  }

  currentSettings(): SettingsSnapshot {
    return this.settings;
  }

  private preflight() {
    const s = this.settings;
    if (!Number.isInteger(s.start_row) || !Number.isInteger(s.end_row) || s.start_row < 2 || s.end_row < s.start_row) {
      throw new PreflightError(`Invalid row range [${s.start_row}, ${s.end_row}]: rows start at 2 and end must not precede start.`);
    }
    if (!Number.isInteger(s.checkpoint_every) || s.checkpoint_every < 1) {
      throw new PreflightError(`Invalid checkpoint_every ${s.checkpoint_every}: must be a positive integer.`);
    }
    if (!Number.isFinite(s.budget_per_row) || s.budget_per_row < 0) {
      throw new PreflightError(`Invalid budget_per_row ${s.budget_per_row}: must be a non-negative number.`);
    }

    try {
      fs.accessSync(s.input_path, fs.constants.R_OK);
    } catch (err) {
      throw new PreflightError(`Input file is missing or unreadable: ${s.input_path}`, { cause: err });
    }

    const outDir = path.dirname(path.resolve(s.output_path));
    try {
      fs.accessSync(outDir, fs.constants.W_OK);
    } catch (err) {
      throw new PreflightError(`Output directory is not writable: ${outDir}`, { cause: err });
    }

    const missing = missingCredentials(this.deps.caps, s.mode);
    if (missing.length) {
      throw new PreflightError(`Missing or invalid credentials for: ${missing.join(", ")}`);
    }

    const rows = s.end_row - s.start_row + 1;
    const estimate = estimateCost(rows, s.mode, s.model_name, this.costs);
    this.logger.info(`Estimated cost for ${rows} rows: ${estimate.toFixed(2)}`);
    if (!withinBudget(estimate, rows, s.budget_per_row)) {
      this.logger.warn(`Estimate exceeds the budget of ${s.budget_per_row.toFixed(2)} per row.`);
    }
  }

  private async run(initial: SettingsSnapshot): Promise<void> {
    let settings = initial;
    let message: string;

    try {
      this.records = [];
      this.restoredCount = 0;
      let resumeCursor = settings.start_row;

      const checkpoint = this.checkpoints.load(settings.input_path);
      if (checkpoint) {
        settings = snapshotSettings(checkpoint.job_settings);
        this.settings = settings;
        this.records = checkpoint.processed_records.map(freezeRecord);
        this.restoredCount = this.records.length;
        resumeCursor = checkpoint.last_processed_row + 1;
        this.logger.info(`Resuming from checkpoint. Starting at row ${resumeCursor}.`);
      }
      this.lastCompletedRow = resumeCursor - 1;

      const table = await readTable(settings.input_path);
      const end = Math.min(settings.end_row, lastSheetRow(table));
      const firstNewRow = Math.max(settings.start_row, resumeCursor);
      const total = Math.max(0, end - settings.start_row + 1);

      const adapter = new MappedColumnsAdapter(settings.column_mapping);
      const caps = resilientCapabilities(this.deps.caps, this.deps.retryPolicy ?? DEFAULT_RETRY_POLICY, {
        logger: this.logger,
        sleep: this.deps.sleep
      });
      const resolver = new IdentityResolver(settings, { caps, costs: this.costs, logger: this.logger });

      let processedThisRun = 0;
      let interrupted = false;
      for (let row = firstNewRow; row <= end; row++) {
        if (this.gate.isPaused()) {
          this.logger.info(`Paused before row ${row}.`);
          await this.gate.wait();
          if (!this.stopped) this.logger.info("Resumed.");
        }
        if (this.stopped) {
          interrupted = true;
          break;
        }

        const raw = adapter.parseRow(table.rows[sheetRowToIndex(row)] ?? {}, table.headers);
        const record = await this.resolveRow(resolver, raw, row);

        this.records.push(record);
        this.lastCompletedRow = row;
        processedThisRun++;
        this.deps.onStatus(this.records.length, total, `Processed row ${row}`);

        if (processedThisRun % settings.checkpoint_every === 0) {
          this.checkpoints.save(row, settings, this.records);
        }
      }

      // Restored records sit immediately before the first row of this run.
      const firstSheetRow = firstNewRow - this.restoredCount;

      if (interrupted) {
        if (this.records.length) this.checkpoints.save(this.lastCompletedRow, settings, this.records);
        this.writeOutput(table, firstSheetRow, settings);
        message = STOPPED;
      } else {
        this.writeOutput(table, firstSheetRow, settings);
        this.checkpoints.delete();
        message = COMPLETED;
      }
    } catch (err) {
      this.logger.error(`Job failed: ${errorMessage(err)}`);
      message = `Failed: ${errorMessage(err)}`;
      if (this.records.length) {
        try {
          this.checkpoints.save(this.lastCompletedRow, settings, this.records);
        } catch (saveErr) {
          this.logger.error(`Could not save checkpoint after failure: ${errorMessage(saveErr)}`);
        }
      }
    }

    this.running = false;
    this.deps.onCompletion(message);
  }

  private async resolveRow(resolver: IdentityResolver, raw: RawRecord, row: number): Promise<ResolvedRecord> {
    try {
      return await resolver.resolve(raw);
    } catch (err) {
      const detail = errorMessage(err);
      this.logger.error(`Row ${row} failed: ${detail}`);
      const partial = err instanceof RowProcessingError ? err : undefined;
      const evidence = [partial?.evidence, `Row ${row} ("${raw.merchant_name_raw}") could not be resolved: ${detail}`]
        .filter(Boolean)
        .join("\n");
      return freezeRecord({
        cleaned_name: "",
        website: "",
        socials: [],
        evidence,
        evidence_links: [],
        accumulated_cost: partial?.cost ?? 0,
        remarks: `${REMARK_FATAL_PREFIX}: ${detail}`,
        logo_filename: ""
      });
    }
  }

  private writeOutput(table: Table, firstSheetRow: number, settings: SettingsSnapshot) {
    if (!this.records.length) return;
    try {
      const merged = reconcileTable(table, this.records, firstSheetRow, settings.output_columns);
      writeTable(settings.output_path, merged);
      this.logger.info(`Output written: ${settings.output_path} (rows ${firstSheetRow}-${firstSheetRow + this.records.length - 1})`);
    } catch (err) {
      throw new OutputWriteError(`Could not write output ${settings.output_path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function freezeRecord(r: ResolvedRecord): ResolvedRecord {
  return Object.freeze({ ...r, socials: Object.freeze([...r.socials]), evidence_links: Object.freeze([...r.evidence_links]) });
}
