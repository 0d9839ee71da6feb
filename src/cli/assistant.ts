#!/usr/bin/env node
import { Argument, Command } from "commander";
import { loadConfig } from "../config/config.js";
import { runMentionIngest } from "../jobs/ingest.js";

async function main() {
  const program = new Command();
  program
    .name("advisor-assistant")
    .description("Collect ticker mentions from configured sources")
    .addArgument(new Argument("<source>", "Data source to scrape").choices(["reddit", "all"]))
    .option("-c, --config <path>", "Path to a JSON config file")
    .option("-v, --verbose", "Enable verbose output");

  program.parse(process.argv);
  const source = program.args[0] ?? "reddit";
  const opts = program.opts<{ config?: string; verbose?: boolean }>();
  const verbose = opts.verbose === true;

  const cfg = loadConfig({ configPath: opts.config });
  if (verbose) {
    console.log(`Starting data collection for: ${source}`);
  }
  // Reddit is the only implemented source, so "all" runs it alone.
  const summary = await runMentionIngest({ cfg, verbose });
  if (verbose) {
    console.log(
      `Reddit: stored=${summary.stored} skipped=${summary.skipped} ` +
        `(no ticker ${summary.skippedNoTicker}, duplicate ${summary.skippedDuplicate}, ` +
        `untracked ${summary.skippedUntracked}) failures=${summary.failures}`,
    );
  }
  if (summary.failures > 0) {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
