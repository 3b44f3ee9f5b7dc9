#!/usr/bin/env node
/**
 * chief-tally: print the chief's ranked proposals.
 *
 * Usage:
 *   chief-tally          ranked list, hat in green, spells in magenta
 *   chief-tally --json   machine-readable report
 *
 * Progress goes to stderr as pino JSON. On any fatal error nothing is printed
 * to stdout and the exit code is 1.
 */

import { Command } from "commander";
import pc from "picocolors";
import { logger } from "./lib/logger.js";
import { createChiefContext, renderJson, renderText, runTally } from "./tools/chief.js";

interface TallyOptions {
  json: boolean;
}

const command = new Command("chief-tally")
  .description("Rank a chief's proposals from its on-chain vote history")
  .option("--json", "Output in JSON format", false)
  .action(async (options: TallyOptions) => {
    const report = await runTally(createChiefContext());
    process.stdout.write(`${options.json ? renderJson(report) : renderText(report, pc)}\n`);
  });

command.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, "tally failed");
  process.exit(1);
});
