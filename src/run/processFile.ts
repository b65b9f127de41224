#!/usr/bin/env node
import * as readline from "readline";
import { JobOrchestrator } from "../jobs/JobOrchestrator.js";
import { createMockCapabilities } from "../mock/MockCapabilities.js";
import { createJobLogger } from "../log/jobLogger.js";
import { env } from "../config/env.js";
import { hasFlag, settingsFromArgs } from "./args.js";
import { liveCapabilities, retryPolicyFromEnv } from "./liveCapabilities.js";

async function main() {
  const settings = settingsFromArgs();
  const mock = hasFlag("--mock");
  const logger = createJobLogger(mock ? "mock" : "job", { logFile: env.LOG_FILE || undefined });

  const job = new JobOrchestrator(settings, {
    caps: mock ? createMockCapabilities() : liveCapabilities(settings.model_name),
    retryPolicy: retryPolicyFromEnv(),
    logger,
    onStatus: (processed, total, message) => {
      if (processed % 10 === 0 || processed === total) logger.info(`[${processed}/${total}] ${message}`);
    },
    onCompletion: (message) => logger.info(`Job finished: ${message}`)
  });

  job.start();
  logger.info(`Started job ${job.jobId}. Type "pause", "resume" or "stop"; Ctrl+C stops after the current row.`);

  let interrupts = 0;
  process.on("SIGINT", () => {
    interrupts++;
    if (interrupts > 1) process.exit(130);
    logger.warn("Stopping after the current row (Ctrl+C again to abort without saving).");
    job.stop();
  });

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  rl.on("line", (line) => {
    const cmd = line.trim().toLowerCase();
    if (cmd === "pause") job.pause();
    else if (cmd === "resume") job.resume();
    else if (cmd === "stop") job.stop();
  });

  await job.done();
  rl.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
