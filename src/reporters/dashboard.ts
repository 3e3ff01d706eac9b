/**
 * Dashboard Reporter
 *
 * Builds the dashboard sheets (summary, approach frequency, primary approach,
 * timeline, success patterns, raw data) and writes them as one Excel
 * workbook with bold, shaded and frozen header rows.
 *
 * @module reporters/dashboard
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import ExcelJS, { type Workbook } from "exceljs";
import { ErrorCode, StratifyError, type CorpusSummary, type SessionRecord } from "../core/types.js";
import {
  buildDashboardStats,
  formatPercentage,
  rankCounts,
} from "../services/corpus-aggregation.js";
import { SESSION_CSV_HEADER, toSessionRow, type CsvValue } from "./csv-export.js";

const HEADER_FILL = "FFD9E1F2";
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 50;

/**
 * One dashboard sheet.
 */
export interface DashboardSheet {
  name: string;
  /** First row is the header */
  rows: CsvValue[][];
}

function summarySheet(summary: CorpusSummary, records: readonly SessionRecord[], generatedAt: Date): DashboardSheet {
  const { dateRange } = buildDashboardStats(records);

  return {
    name: "Dashboard",
    rows: [
      ["Metric", "Value"],
      ["Analysis Date", generatedAt.toISOString()],
      ["Total Sessions", summary.totalSessions],
      ["Date Range", dateRange ? `${dateRange.first} to ${dateRange.last}` : ""],
      ["Unique Approaches", Object.keys(summary.approachFrequencies).length],
    ],
  };
}

function approachFrequencySheet(summary: CorpusSummary): DashboardSheet {
  return {
    name: "Approach Frequency",
    rows: [
      ["Problem-Solving Approach", "Count", "Percentage"],
      ...rankCounts(summary.approachFrequencies).map(([approach, count]): CsvValue[] => [
        approach,
        count,
        formatPercentage(count, summary.totalSessions),
      ]),
    ],
  };
}

function primaryApproachSheet(summary: CorpusSummary): DashboardSheet {
  return {
    name: "Primary Approach",
    rows: [
      ["Primary Approach", "Count"],
      ...rankCounts(summary.primaryApproachDistribution).map(([approach, count]): CsvValue[] => [approach, count]),
    ],
  };
}

function timelineSheet(records: readonly SessionRecord[]): DashboardSheet {
  const { timeline } = buildDashboardStats(records);

  return {
    name: "Timeline",
    rows: [
      ["Date", "Total Sessions", "Exploratory", "Error Recovery", "Validation", "Direct Implementation"],
      ...timeline.map((entry): CsvValue[] => [
        entry.date,
        entry.totalSessions,
        entry.exploratory,
        entry.errorRecovery,
        entry.validation,
        entry.directImplementation,
      ]),
    ],
  };
}

function successPatternsSheet(summary: CorpusSummary, records: readonly SessionRecord[]): DashboardSheet {
  const stats = buildDashboardStats(records);
  const total = summary.totalSessions;
  const indicatorRow = (label: string, count: number): CsvValue[] => [label, count, formatPercentage(count, total)];

  return {
    name: "Success Patterns",
    rows: [
      ["Metric", "Value", "Notes"],
      indicatorRow("Sessions with File Modifications", stats.successIndicatorCounts["Files Modified"]),
      indicatorRow("Sessions with Validation", stats.successIndicatorCounts.Validated),
      indicatorRow("Sessions with Good Error Recovery", stats.successIndicatorCounts["Good Error Recovery"]),
      indicatorRow("Substantial Work Sessions", stats.successIndicatorCounts["Substantial Work"]),
      indicatorRow("Planning-Heavy Sessions", stats.planningDistribution["planning-heavy"]),
      indicatorRow("Balanced Sessions", stats.planningDistribution.balanced),
      indicatorRow("Execution-Heavy Sessions", stats.planningDistribution["execution-heavy"]),
      ["Average Turns per Session", summary.averageTurns.toFixed(1), ""],
      ["Average Messages per Session", stats.averageMessages.toFixed(1), ""],
    ],
  };
}

function rawDataSheet(records: readonly SessionRecord[]): DashboardSheet {
  return {
    name: "Raw Data",
    rows: [[...SESSION_CSV_HEADER], ...records.map(toSessionRow)],
  };
}

/**
 * Build every dashboard sheet.
 */
export function buildDashboardSheets(
  records: readonly SessionRecord[],
  summary: CorpusSummary,
  generatedAt: Date = new Date(),
): DashboardSheet[] {
  return [
    summarySheet(summary, records, generatedAt),
    approachFrequencySheet(summary),
    primaryApproachSheet(summary),
    timelineSheet(records),
    successPatternsSheet(summary, records),
    rawDataSheet(records),
  ];
}

function columnWidth(rows: readonly CsvValue[][], column: number): number {
  const longest = Math.max(0, ...rows.map((row) => String(row[column] ?? "").length));
  return Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, longest + 2));
}

/**
 * Assemble the workbook, one worksheet per sheet.
 */
export function buildWorkbook(sheets: readonly DashboardSheet[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "stratify";

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name, {
      views: [{ state: "frozen", ySplit: 1 }],
    });
    worksheet.addRows(sheet.rows);

    const header = worksheet.getRow(1);
    header.font = { bold: true };
    header.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_FILL } };

    const columnCount = sheet.rows[0]?.length ?? 0;
    for (let column = 0; column < columnCount; column++) {
      worksheet.getColumn(column + 1).width = columnWidth(sheet.rows, column);
    }
  }

  return workbook;
}

/**
 * Write the sheets as an .xlsx workbook, creating parent directories.
 *
 * @throws StratifyError (FILE_WRITE_FAILED) when the workbook cannot be written
 */
export async function writeDashboard(filePath: string, sheets: readonly DashboardSheet[]): Promise<void> {
  const workbook = buildWorkbook(sheets);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);
  } catch (error) {
    throw new StratifyError(
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.FILE_WRITE_FAILED,
      { path: filePath },
    );
  }
}
