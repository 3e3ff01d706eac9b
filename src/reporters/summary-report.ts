/**
 * Summary Report
 *
 * Turns the Corpus Summary into the lines printed at the end of
 * `stratify analyze`. Formatting only; printing is left to the CLI formatter.
 *
 * @module reporters/summary-report
 */

import type { CorpusSummary, PatternStatistics } from "../core/types.js";
import { formatPercentage, rankCounts } from "../services/corpus-aggregation.js";

/** Pattern statistics in display order */
export const PATTERN_LABELS: ReadonlyArray<[keyof PatternStatistics, string]> = [
  ["iterativeSessions", "Iterative sessions"],
  ["exploratorySessions", "Exploratory sessions"],
  ["implementationSessions", "Implementation sessions"],
  ["delegatedSessions", "Delegated sessions"],
  ["validatedSessions", "Validated sessions"],
  ["errorRecoverySessions", "Error recovery sessions"],
];

export interface SummaryReport {
  overview: Array<[string, string | number]>;
  /** Approach frequencies, most frequent first */
  approaches: string[];
  patterns: string[];
}

export function buildSummaryReport(summary: CorpusSummary): SummaryReport {
  const total = summary.totalSessions;

  const approaches = rankCounts(summary.approachFrequencies).map(
    ([approach, count]) => `${approach}: ${count} (${formatPercentage(count, total)})`,
  );

  const patterns = PATTERN_LABELS.map(([key, label]) => {
    const count = summary.patternStatistics[key];
    return `${label}: ${count} (${formatPercentage(count, total)})`;
  });

  return {
    overview: [
      ["Total sessions analyzed", total],
      ["Average turns per session", summary.averageTurns],
      ["Average duration", `${summary.averageDurationMinutes.toFixed(1)} minutes`],
    ],
    approaches,
    patterns,
  };
}
