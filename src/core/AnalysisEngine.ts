/**
 * Analysis Engine
 *
 * Orchestrates one complete analysis run: load sessions from every available
 * adapter, analyze each session, aggregate the corpus. Every run recomputes
 * from scratch; nothing is persisted here.
 *
 * This is the core logic that powers the `stratify analyze` command.
 *
 * @module core/AnalysisEngine
 */

import type { SessionAdapter, SessionLoadError } from "../adapters/session/SessionAdapter.js";
import { createDefaultDetectors, type DetectorSet } from "../analyzers/index.js";
import { aggregateCorpus } from "../services/corpus-aggregation.js";
import { analyzeSessions } from "../services/session-analysis.js";
import { createSilentLogger, type Logger } from "../utils/logger.js";
import type { CorpusSummary, RawSession, SessionRecord } from "./types.js";

/**
 * Analysis result with comprehensive statistics.
 */
export interface AnalysisResult {
  /** Overall status of the analysis run */
  status: "success" | "partial_failure" | "failure";

  /** Sessions supplied by the adapters */
  sessionsFound: number;

  /** Sessions that produced a Session Record */
  sessionsAnalyzed: number;

  /** Sessions excluded for missing metadata or an empty transcript */
  sessionsSkipped: number;

  records: SessionRecord[];

  summary: CorpusSummary;

  /** When analysis started */
  startTime: Date;

  /** When analysis completed */
  endTime: Date;

  /** Total duration in milliseconds */
  durationMs: number;

  /** Errors that occurred while loading sessions */
  errors: AnalysisError[];
}

/**
 * Error that occurred while loading sessions.
 */
export interface AnalysisError {
  /** Adapter that was loading */
  adapter: string;

  /** Path that failed, when known */
  path?: string;

  /** Reason for failure */
  reason: string;
}

/**
 * Options for running analysis.
 */
export interface AnalysisOptions {
  /** Only analyze the first N loaded sessions */
  limit?: number;
}

/**
 * Analysis Engine orchestrator.
 *
 * All dependencies are injected for testability.
 */
export class AnalysisEngine {
  private sessionAdapters: SessionAdapter[];
  private logger: Logger;
  private detectors: DetectorSet;

  /**
   * @param sessionAdapters - Session sources to read from
   * @param logger - Run logger (silent by default)
   * @param detectors - Detector set (the standard seven by default)
   */
  constructor(
    sessionAdapters: SessionAdapter[],
    logger: Logger = createSilentLogger(),
    detectors: DetectorSet = createDefaultDetectors()
  ) {
    this.sessionAdapters = sessionAdapters;
    this.logger = logger;
    this.detectors = detectors;
  }

  /**
   * Run the complete analysis workflow.
   *
   * Algorithm:
   * 1. For each available adapter, load its sessions
   * 2. Apply the optional limit
   * 3. Analyze each session (detectors, classifier, summarizer)
   * 4. Aggregate all Session Records into the Corpus Summary
   *
   * @param options - Optional analysis options
   * @returns Analysis result with records, summary and errors
   */
  async run(options: AnalysisOptions = {}): Promise<AnalysisResult> {
    const startTime = new Date();
    this.logger.info("Starting analysis");

    const { sessions, errors } = await this.loadSessions();

    const selected =
      options.limit !== undefined && options.limit >= 0 ? sessions.slice(0, options.limit) : sessions;

    const { records, skipped } = analyzeSessions(selected, this.detectors);
    for (const raw of skipped) {
      this.logger.debug({ path: raw.metadataPath }, "Skipped session without metadata or messages");
    }

    const summary = aggregateCorpus(records);
    const endTime = new Date();

    const result: AnalysisResult = {
      status: this.determineStatus(records.length, errors.length),
      sessionsFound: sessions.length,
      sessionsAnalyzed: records.length,
      sessionsSkipped: skipped.length,
      records,
      summary,
      startTime,
      endTime,
      durationMs: endTime.getTime() - startTime.getTime(),
      errors,
    };

    this.logger.info(
      {
        status: result.status,
        sessionsFound: result.sessionsFound,
        sessionsAnalyzed: result.sessionsAnalyzed,
        sessionsSkipped: result.sessionsSkipped,
        errors: errors.length,
        durationMs: result.durationMs,
      },
      "Analysis complete"
    );

    return result;
  }

  /**
   * Collect sessions from every available adapter. Adapter failures are
   * recorded and the run continues with the remaining adapters.
   */
  private async loadSessions(): Promise<{ sessions: RawSession[]; errors: AnalysisError[] }> {
    const sessions: RawSession[] = [];
    const errors: AnalysisError[] = [];

    for (const adapter of this.sessionAdapters) {
      try {
        if (!(await adapter.isAvailable())) {
          this.logger.warn({ adapter: adapter.name }, "Adapter not available, skipping");
          continue;
        }

        const loaded = await adapter.getSessions();
        sessions.push(...loaded.sessions);
        errors.push(...loaded.errors.map((error: SessionLoadError) => ({ adapter: adapter.name, ...error })));

        this.logger.info(
          { adapter: adapter.name, sessions: loaded.sessions.length, errors: loaded.errors.length },
          "Loaded sessions"
        );
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error({ adapter: adapter.name, reason }, "Adapter failed");
        errors.push({ adapter: adapter.name, reason });
      }
    }

    return { sessions, errors };
  }

  private determineStatus(recordCount: number, errorCount: number): AnalysisResult["status"] {
    if (errorCount === 0) {
      return "success";
    }
    return recordCount > 0 ? "partial_failure" : "failure";
  }
}
