/**
 * Analyze Command Handler
 *
 * Entry point for `stratify analyze`. Wires the session adapter, the
 * analysis engine and the exporters together, then prints the corpus summary.
 *
 * @module cli/commands/analyze
 */

import { join } from "node:path";
import { AmplifierSessionAdapter } from "../../adapters/session/AmplifierSession.js";
import { AnalysisEngine, type AnalysisResult } from "../../core/AnalysisEngine.js";
import { ErrorCode, StratifyError } from "../../core/types.js";
import { buildDashboardSheets, writeDashboard } from "../../reporters/dashboard.js";
import { exportToCsv } from "../../reporters/csv-export.js";
import { exportToJson } from "../../reporters/json-export.js";
import { buildSummaryReport } from "../../reporters/summary-report.js";
import { readConfig } from "../../storage/config.js";
import {
  DASHBOARD_XLSX,
  SESSION_ANALYSIS_CSV,
  SESSION_ANALYSIS_JSON,
} from "../../storage/paths.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { Formatter, formatter as defaultFormatter } from "../formatter.js";

/**
 * Flags for the analyze command.
 */
export interface AnalyzeFlags {
  /** Projects directory to scan (overrides config) */
  dir?: string;
  /** Output directory for exports (overrides config) */
  output?: string;
  /** Only analyze the first N sessions */
  limit?: number;
  /** Also write the dashboard workbook */
  dashboard?: boolean;
  verbose?: boolean;
  /** Alternate config file */
  config?: string;
}

/**
 * Collaborators, injectable for tests.
 */
export interface AnalyzeDeps {
  formatter?: Formatter;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Handle the analyze command.
 *
 * @returns Process exit code (0 on success or partial failure, 1 otherwise)
 */
export async function handleAnalyze(flags: AnalyzeFlags, deps: AnalyzeDeps = {}): Promise<number> {
  const out = deps.formatter ?? defaultFormatter;
  const verbose = flags.verbose ?? false;

  try {
    const config = await readConfig(flags.config);
    const projectsDir = flags.dir ?? config.projectsDir;
    const outputDir = flags.output ?? config.outputDir ?? process.cwd();
    const writeDashboardSheets = flags.dashboard === true || config.dashboard;
    const logger = deps.logger ?? createLogger("analyze", { level: config.logLevel, verbose });

    const adapter = new AmplifierSessionAdapter(projectsDir, logger);
    if (!(await adapter.isAvailable())) {
      throw new StratifyError(`Projects directory not found: ${projectsDir}`, ErrorCode.PROJECTS_DIR_MISSING, {
        projectsDir,
      });
    }

    out.info(`Analyzing sessions in ${projectsDir}`);

    const spinner = out.spinner("Analyzing sessions...");
    spinner.start();
    const engine = new AnalysisEngine([adapter], logger);
    const result = await engine.run({ limit: flags.limit });
    spinner.stop();

    if (result.status === "failure") {
      out.error("Analysis failed: no session could be loaded");
      printErrors(out, result);
      return 1;
    }

    if (result.sessionsAnalyzed === 0) {
      out.warning("No valid sessions found");
    }

    const generatedAt = (deps.now ?? (() => new Date()))();
    const jsonPath = join(outputDir, SESSION_ANALYSIS_JSON);
    const csvPath = join(outputDir, SESSION_ANALYSIS_CSV);

    await exportToJson(jsonPath, result.records, result.summary, generatedAt);
    out.success(`Exported to ${jsonPath}`);
    await exportToCsv(csvPath, result.records);
    out.success(`Exported to ${csvPath}`);

    if (writeDashboardSheets) {
      const dashboardPath = join(outputDir, DASHBOARD_XLSX);
      const sheets = buildDashboardSheets(result.records, result.summary, generatedAt);
      await writeDashboard(dashboardPath, sheets);
      out.success(`Dashboard written to ${dashboardPath}`);
    }

    printSummary(out, result);

    if (result.status === "partial_failure") {
      out.warning(`${result.errors.length} session(s) could not be loaded`);
      if (verbose) {
        printErrors(out, result);
      }
    }

    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    out.error(`Analysis failed: ${message}`);
    return 1;
  }
}

/**
 * Print the corpus summary.
 */
function printSummary(out: Formatter, result: AnalysisResult): void {
  const report = buildSummaryReport(result.summary);

  out.header("Summary Statistics");
  out.table([
    ...report.overview,
    ["Sessions skipped", result.sessionsSkipped],
  ]);

  out.subheader("Approach Frequencies:");
  out.list(report.approaches);

  out.subheader("Pattern Statistics:");
  out.list(report.patterns);
  out.newline();
}

function printErrors(out: Formatter, result: AnalysisResult): void {
  out.list(result.errors.map((error) => `${error.adapter}: ${error.path ?? "-"}: ${error.reason}`));
}
