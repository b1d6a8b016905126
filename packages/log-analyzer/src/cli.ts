import { Command } from "commander";
import {
  ANALYZER_ENV_REQUIREMENTS,
  createLogger,
  validateEnvironment,
} from "@logscope/shared/utils";

import { runAnalysis, type AnalysisResult } from "./analysis.js";
import { isAnalyzerError } from "./errors.js";

const logger = createLogger("logscope");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface CliOptions {
  json?: string;
  log?: string;
  out: string;
  service?: string;
  host?: string;
  databaseUrl?: string;
}

/** Human-readable run summary, one entry per output line. */
export function formatSummary(result: AnalysisResult): string[] {
  const lines = [
    `Logs loaded: ${result.loaded}`,
    `Logs after filter: ${result.records.length}`,
    `Burst errors detected: ${result.bursts.length}`,
    `Long running issues detected: ${result.recurring.size}`,
  ];

  for (const [message, days] of result.recurring) {
    lines.push(`  ${message}: ${[...days].sort().join(", ")}`);
  }

  if (result.persisted !== null) {
    lines.push(`Records persisted: ${result.persisted}`);
  }
  lines.push(`CSV files written to: ${result.outDir}`);
  return lines;
}

/**
 * Log a failed run and turn it into the message shown on stderr. Fatal
 * analyzer codes log at `fatal`, any other analyzer code at `error`.
 */
export function describeFailure(err: unknown): string {
  if (isAnalyzerError(err)) {
    const fields = { err, code: err.code, details: err.details };
    if (err.fatal) {
      logger.fatal(fields, err.message);
    } else {
      logger.error(fields, err.message);
    }
    return `Error: ${err.message}`;
  }

  logger.fatal({ err }, "Log analysis failed");
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const { values } = validateEnvironment(ANALYZER_ENV_REQUIREMENTS, env);

  const program = new Command();

  program
    .name("logscope")
    .description("Analyze application logs for error bursts and recurring issues")
    .option("--json <path>", "Path to JSON log file")
    .option("--log <path>", "Path to text log file")
    .option("--out <dir>", "Output folder", values["LOGSCOPE_OUT_DIR"] ?? "output")
    .option("--service <name>", "Filter by service")
    .option("--host <name>", "Filter by host")
    .option(
      "--database-url <url>",
      "PostgreSQL connection string; persists the filtered records",
      values["DATABASE_URL"],
    )
    .action(async (opts: CliOptions) => {
      const result = await runAnalysis({
        jsonPath: opts.json,
        logPath: opts.log,
        outDir: opts.out,
        service: opts.service,
        host: opts.host,
        databaseUrl: opts.databaseUrl,
      });

      for (const line of formatSummary(result)) {
        console.log(line);
      }
    });

  return program;
}
