/**
 * CSV Exporter
 *
 * One row per Session Record, for spreadsheet tools. Also provides the CSV
 * encoding used by the dashboard sheets.
 *
 * @module reporters/csv-export
 */

import type { SessionRecord } from "../core/types.js";
import { round2 } from "../services/corpus-aggregation.js";
import { writeOutputFile } from "./output.js";

export type CsvValue = string | number | boolean;

export const SESSION_CSV_HEADER = [
  "Session ID",
  "Parent Session",
  "Created",
  "Name",
  "Project",
  "Bundle",
  "Model",
  "Turn Count",
  "Message Count",
  "Duration (min)",
  "Primary Approach",
  "All Approaches",
  "Is Iterative",
  "Iteration Count",
  "Is Exploratory",
  "Exploration Count",
  "Has Delegation",
  "Delegation Count",
  "File Operations",
  "Errors",
  "Recovery Rate",
  "Validation Count",
  "Planning Ratio",
  "Success Indicators",
] as const;

/**
 * Quote a field when it contains a comma, a quote, CR or LF; embedded
 * quotes are doubled.
 */
export function escapeCsvField(value: CsvValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Encode rows as CSV text, one line per row with a trailing newline.
 */
export function formatCsv(rows: ReadonlyArray<ReadonlyArray<CsvValue>>): string {
  return rows.map((row) => row.map(escapeCsvField).join(",")).join("\n") + "\n";
}

export function toSessionRow(record: SessionRecord): CsvValue[] {
  const { patterns } = record;

  return [
    record.sessionId,
    record.parentSessionId,
    record.created,
    record.name,
    record.project,
    record.bundle,
    record.model,
    record.turnCount,
    record.messageCount,
    record.durationMinutes,
    record.primaryApproach,
    record.approaches.join(", "),
    patterns.iteration.isIterative,
    patterns.iteration.iterationCount,
    patterns.exploration.isExploratory,
    patterns.exploration.explorationToolCount,
    patterns.delegation.hasDelegation,
    patterns.delegation.delegationCount,
    patterns.implementation.totalFileOps,
    patterns.errorRecovery.errorsEncountered,
    patterns.errorRecovery.recoveryRate,
    patterns.validation.totalValidation,
    round2(patterns.planningExecution.planningRatio),
    record.successIndicators.join(", "),
  ];
}

export function buildSessionCsv(records: readonly SessionRecord[]): string {
  return formatCsv([[...SESSION_CSV_HEADER], ...records.map(toSessionRow)]);
}

export async function exportToCsv(outputPath: string, records: readonly SessionRecord[]): Promise<void> {
  await writeOutputFile(outputPath, buildSessionCsv(records));
}
