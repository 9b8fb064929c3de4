#!/usr/bin/env node
import { existsSync, realpathSync } from "fs";
import { pathToFileURL } from "url";
import { analysis } from "./config/config.js";
import { createAnalyzerFromConfig } from "./services/institutional/analyzer.service.js";
import { formatReport } from "./services/institutional/report.service.js";
import { errorMessage } from "./utils/errors.js";
import type { AnalysisResult } from "./types/institutional.types.js";

export type CliArgs = {
  cik: string;
  exportResults: boolean;
  sortBySecondaryMetric: boolean;
};

/**
 * holdings-delta [cik] [--export] [--sort-by-share-change]
 */
export function parseCliArgs(argv: string[], defaultCik: string = analysis.defaultCik): CliArgs {
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  return {
    cik: positional[0] ?? defaultCik,
    exportResults: argv.includes("--export"),
    sortBySecondaryMetric: argv.includes("--sort-by-share-change"),
  };
}

export async function runCli(argv: string[]): Promise<AnalysisResult> {
  const args = parseCliArgs(argv);
  const result = await createAnalyzerFromConfig().analyze(
    args.cik,
    args.exportResults,
    args.sortBySecondaryMetric,
  );

  console.log("=".repeat(80));
  console.log(formatReport(result));
  console.log("=".repeat(80));
  if (result.exportedFiles) {
    console.log(`\n💾 CSV files:`);
    console.log(`   ${result.exportedFiles.holdings}`);
    console.log(`   ${result.exportedFiles.buys}`);
    console.log(`   ${result.exportedFiles.sells}`);
  }
  return result;
}

/** npm installs `bin` entries as symlinks, so compare resolved paths. */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  runCli(process.argv.slice(2))
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error(`\n❌ Analysis failed: ${errorMessage(error)}`);
      process.exit(1);
    });
}
