import * as fs from "node:fs";

import { Command } from "commander";
import type { Logger } from "pino";
import { Errors, SpriteSheet } from "aseprite-sheet";
import { type SheetSummary, formatSummary, summarizeSheet } from "./summary.ts";

export interface InspectOptions {
  strict: boolean;
  json: boolean;
  verbose: boolean;
}

/**
 * Create the CLI program.
 */
export function createProgram(logger: Logger): Command {
  const program = new Command();

  program
    .name("sheet-inspect")
    .description("Summarize aseprite JSON sprite sheet exports")
    .version("0.1.0")
    .argument("<files...>", "JSON export files to inspect")
    .option("--strict", "Reject unknown fields, unknown directions and bad tag ranges", false)
    .option("--json", "Print summaries as JSON", false)
    .option("--verbose", "Verbose output", false)
    .action(async (files: string[], opts: InspectOptions) => {
      await runInspect(files, opts, logger);
    });

  return program;
}

/**
 * Read and summarize one export file.
 */
export async function inspectFile(file: string, options: Pick<InspectOptions, "strict">): Promise<SheetSummary> {
  const data = await fs.promises.readFile(file);
  const sheet = SpriteSheet.fromBuffer(data, options.strict ? Errors.ALL : Errors.DEFAULT);
  return summarizeSheet(file, sheet);
}

async function runInspect(files: string[], options: InspectOptions, logger: Logger): Promise<void> {
  const summaries: SheetSummary[] = [];
  let success = true;

  for (const [i, file] of files.entries()) {
    if (options.verbose) {
      logger.info(`[${i + 1}/${files.length}] Inspecting: ${file}`);
    }

    try {
      const summary = await inspectFile(file, options);
      summaries.push(summary);
      if (!options.json) {
        console.log(formatSummary(summary).join("\n"));
      }
    } catch (e) {
      logger.error({ file }, e instanceof Error ? e.message : String(e));
      success = false;
    }
  }

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
  }

  if (!success) {
    logger.error("Some files could not be inspected.");
    process.exitCode = 1;
  }
}
