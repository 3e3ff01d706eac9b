/**
 * JSON Exporter
 *
 * Serializes the Session Records and the Corpus Summary of one run into a
 * single document.
 *
 * @module reporters/json-export
 */

import type { CorpusSummary, SessionRecord } from "../core/types.js";
import { writeOutputFile } from "./output.js";

/**
 * Shape of session_analysis.json.
 */
export interface AnalysisExport {
  generatedAt: string;
  summaryStatistics: CorpusSummary;
  sessions: SessionRecord[];
}

export function buildAnalysisExport(
  records: readonly SessionRecord[],
  summary: CorpusSummary,
  generatedAt: Date,
): AnalysisExport {
  return {
    generatedAt: generatedAt.toISOString(),
    summaryStatistics: summary,
    sessions: [...records],
  };
}

/**
 * Write the analysis export as indented JSON.
 */
export async function exportToJson(
  outputPath: string,
  records: readonly SessionRecord[],
  summary: CorpusSummary,
  generatedAt: Date = new Date(),
): Promise<void> {
  const document = buildAnalysisExport(records, summary, generatedAt);
  await writeOutputFile(outputPath, `${JSON.stringify(document, null, 2)}\n`);
}
