/**
 * Session Analysis
 *
 * Runs the per-session pipeline: detectors, classifier, summarizer.
 * Every step is pure, so sessions can be analyzed in any order.
 *
 * @module services/session-analysis
 */

import { createDefaultDetectors, detectPatterns, type DetectorSet } from '../analyzers/index.js';
import { classifyApproaches } from '../core/classifier.js';
import type { RawSession, SessionRecord } from '../core/types.js';
import { summarizeSession } from './session-summary.js';

/**
 * Outcome of analyzing a batch of sessions.
 */
export interface SessionAnalysisResult {
  /** One record per valid session, in input order */
  records: SessionRecord[];

  /** Sessions excluded for missing metadata or an empty transcript */
  skipped: RawSession[];
}

/**
 * Analyze a single session.
 *
 * @returns The Session Record, or null when the session is excluded
 */
export function analyzeSession(
  raw: RawSession,
  detectors: DetectorSet = createDefaultDetectors()
): SessionRecord | null {
  if (!raw.metadata || raw.messages.length === 0) {
    return null;
  }

  const patterns = detectPatterns(raw.messages, detectors);
  const classification = classifyApproaches(patterns);

  return summarizeSession(raw, patterns, classification);
}

/**
 * Analyze a batch of sessions, separating valid records from skipped input.
 */
export function analyzeSessions(
  raws: readonly RawSession[],
  detectors: DetectorSet = createDefaultDetectors()
): SessionAnalysisResult {
  const records: SessionRecord[] = [];
  const skipped: RawSession[] = [];

  for (const raw of raws) {
    const record = analyzeSession(raw, detectors);
    if (record) {
      records.push(record);
    } else {
      skipped.push(raw);
    }
  }

  return { records, skipped };
}
