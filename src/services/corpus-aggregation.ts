/**
 * Corpus Aggregation Service
 *
 * Reduces the full set of Session Records into corpus-wide statistics:
 * approach frequencies, the primary-approach distribution, raw gate adoption
 * counts, averages and a per-day time series.
 *
 * Every function here is a pure reduction; the result does not depend on the
 * order of the input records, apart from the explicit date-key sorting.
 *
 * @module services/corpus-aggregation
 */

import type {
  CorpusSummary,
  PatternStatistics,
  PlanningApproach,
  SessionRecord,
  SuccessIndicator,
} from '../core/types.js';

/** Date key used for sessions without a creation timestamp */
export const UNKNOWN_DATE = 'unknown';

/**
 * One row of the per-day approach breakdown.
 */
export interface TimelineEntry {
  date: string;
  totalSessions: number;
  exploratory: number;
  errorRecovery: number;
  validation: number;
  directImplementation: number;
}

/**
 * Statistics shown on the dashboard beyond the corpus summary.
 */
export interface DashboardStats {
  /** First and last creation date, null when no session has one */
  dateRange: { first: string; last: string } | null;
  /** Dated sessions only, ascending by date */
  timeline: TimelineEntry[];
  successIndicatorCounts: Record<SuccessIndicator, number>;
  planningDistribution: Record<PlanningApproach, number>;
  averageMessages: number;
}

/**
 * Round to two decimals.
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Share of total as a percentage; 0 when total is 0.
 */
export function percentageOf(count: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return (count / total) * 100;
}

/**
 * Percentage with one decimal and a trailing `%` (e.g. "33.3%").
 */
export function formatPercentage(count: number, total: number): string {
  return `${percentageOf(count, total).toFixed(1)}%`;
}

/**
 * Date key of a creation timestamp: its first ten characters, or
 * UNKNOWN_DATE when empty.
 */
export function dateKey(created: string): string {
  return created ? created.slice(0, 10) : UNKNOWN_DATE;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Rebuild a count map with its keys in ascending order.
 */
function sortByKey(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Count sessions per raw detector gate. A session counts toward every gate
 * that fired, including implementation when the classifier suppressed
 * "Direct Implementation" for it.
 */
export function countPatternAdoption(records: readonly SessionRecord[]): PatternStatistics {
  const countWhere = (predicate: (record: SessionRecord) => boolean): number =>
    records.filter(predicate).length;

  return {
    iterativeSessions: countWhere((r) => r.patterns.iteration.isIterative),
    exploratorySessions: countWhere((r) => r.patterns.exploration.isExploratory),
    implementationSessions: countWhere((r) => r.patterns.implementation.isImplementation),
    delegatedSessions: countWhere((r) => r.patterns.delegation.hasDelegation),
    validatedSessions: countWhere((r) => r.patterns.validation.hasValidation),
    errorRecoverySessions: countWhere((r) => r.patterns.errorRecovery.hasErrorRecovery),
  };
}

/**
 * Aggregate Session Records into the Corpus Summary.
 *
 * @param records - Records of all valid sessions
 *
 * @example
 * ```typescript
 * const summary = aggregateCorpus(records);
 * console.log(summary.approachFrequencies['Iterative Refinement']);
 * ```
 */
export function aggregateCorpus(records: readonly SessionRecord[]): CorpusSummary {
  // Date keys come from recorded input, so counts live in Maps until the end.
  const approachFrequencies = new Map<string, number>();
  const primaryApproachDistribution = new Map<string, number>();
  const sessionsByDate = new Map<string, number>();

  for (const record of records) {
    for (const approach of record.approaches) {
      increment(approachFrequencies, approach);
    }
    increment(primaryApproachDistribution, record.primaryApproach);
    increment(sessionsByDate, dateKey(record.created));
  }

  return {
    totalSessions: records.length,
    approachFrequencies: Object.fromEntries(approachFrequencies),
    primaryApproachDistribution: Object.fromEntries(primaryApproachDistribution),
    averageTurns: round2(mean(records.map((r) => r.turnCount))),
    averageDurationMinutes: round2(mean(records.map((r) => r.durationMinutes))),
    patternStatistics: countPatternAdoption(records),
    sessionsByDate: sortByKey(sessionsByDate),
  };
}

/**
 * Per-day breakdown of selected approach labels, dated sessions only.
 */
export function buildTimeline(records: readonly SessionRecord[]): TimelineEntry[] {
  const byDate = new Map<string, TimelineEntry>();

  for (const record of records) {
    if (!record.created) {
      continue;
    }

    const date = dateKey(record.created);
    let entry = byDate.get(date);
    if (!entry) {
      entry = {
        date,
        totalSessions: 0,
        exploratory: 0,
        errorRecovery: 0,
        validation: 0,
        directImplementation: 0,
      };
      byDate.set(date, entry);
    }

    const labels = new Set<string>(record.approaches);
    entry.totalSessions += 1;
    if (labels.has('Exploratory Investigation')) entry.exploratory += 1;
    if (labels.has('Error Recovery & Resilience')) entry.errorRecovery += 1;
    if (labels.has('Validation-Driven')) entry.validation += 1;
    if (labels.has('Direct Implementation')) entry.directImplementation += 1;
  }

  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Compute the dashboard statistics.
 */
export function buildDashboardStats(records: readonly SessionRecord[]): DashboardStats {
  const successIndicatorCounts: Record<SuccessIndicator, number> = {
    'Files Modified': 0,
    'Good Error Recovery': 0,
    Validated: 0,
    'Substantial Work': 0,
  };
  const planningDistribution: Record<PlanningApproach, number> = {
    'planning-heavy': 0,
    balanced: 0,
    'execution-heavy': 0,
  };

  for (const record of records) {
    for (const indicator of record.successIndicators) {
      successIndicatorCounts[indicator] += 1;
    }
    planningDistribution[record.patterns.planningExecution.approach] += 1;
  }

  const dates = records
    .map((r) => r.created)
    .filter((created) => created.length > 0)
    .map((created) => created.slice(0, 10))
    .sort();
  const first = dates[0];
  const last = dates[dates.length - 1];

  return {
    dateRange: first !== undefined && last !== undefined ? { first, last } : null,
    timeline: buildTimeline(records),
    successIndicatorCounts,
    planningDistribution,
    averageMessages: round2(mean(records.map((r) => r.messageCount))),
  };
}

/**
 * Entries of a count map sorted by count descending, ties by key ascending.
 */
export function rankCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort(([keyA, a], [keyB, b]) => b - a || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0));
}
