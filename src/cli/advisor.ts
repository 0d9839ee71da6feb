#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { buildDataSummary, runSentimentAnalysis } from "../jobs/analyze.js";
import { formatAnalysisReport, formatDataSummary } from "../report/format.js";
import { parsePositiveInt } from "./options.js";

async function main() {
  const program = new Command();
  program
    .name("advisor")
    .description("Sentiment analysis and BUY/SELL/HOLD recommendations for tracked tickers")
    .option("-c, --config <path>", "Path to a JSON config file");

  program
    .command("analyze")
    .description("Score stored mentions and print a recommendation per stock")
    .option("-s, --symbol <symbol>", "Stock symbol to analyze")
    .option(
      "-l, --limit <count>",
      "Only consider the newest <count> mentions per stock",
      parsePositiveInt,
    )
    .action(async (opts: { symbol?: string; limit?: number }) => {
      const cfg = loadConfig({ configPath: program.opts<{ config?: string }>().config });
      const reports = await runSentimentAnalysis({
        cfg,
        symbol: opts.symbol,
        limit: opts.limit,
      });
      console.log(formatAnalysisReport(reports));
    });

  program
    .command("summary")
    .description("Show a summary of collected data")
    .action(async () => {
      const cfg = loadConfig({ configPath: program.opts<{ config?: string }>().config });
      console.log(formatDataSummary(await buildDataSummary({ cfg })));
    });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
