/**
 * Session Summarizer
 *
 * Merges metadata, timing, detector signals and classifier output into one
 * Session Record. A session without metadata or without messages is skipped
 * (returns null); that is a filtering rule, not an error.
 *
 * @module services/session-summary
 */

import { basename } from 'node:path';
import type { ApproachClassification } from '../core/classifier.js';
import type {
  Message,
  RawSession,
  SessionPatterns,
  SessionRecord,
  SuccessIndicator,
} from '../core/types.js';

/** Maximum description length kept on a Session Record, in code points */
export const MAX_DESCRIPTION_LENGTH = 200;

/** Turn count above which a session counts as substantial work */
const SUBSTANTIAL_TURN_COUNT = 5;

/** Recovery rate above which error recovery counts as good */
const GOOD_RECOVERY_RATE = 0.5;

/**
 * First `max` code points of a string; never splits a surrogate pair.
 */
export function truncateCodePoints(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:\d{2})?$/;
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse an ISO-8601 timestamp into epoch milliseconds.
 *
 * Every literal `+00:00` is removed first; a date-time without a zone
 * designator is then read as UTC.
 *
 * @returns Milliseconds since epoch, or null when the value is not ISO-8601
 */
export function parseTimestamp(value: string): number | null {
  const cleaned = value.replaceAll('+00:00', '').trim();
  if (!ISO_TIMESTAMP.test(cleaned)) {
    return null;
  }

  let normalized = cleaned.replace(' ', 'T').replace(/(\.\d{3})\d+/, '$1');
  if (normalized.includes('T') && !ZONE_DESIGNATOR.test(normalized)) {
    normalized += 'Z';
  }

  const millis = Date.parse(normalized);
  return Number.isNaN(millis) ? null : millis;
}

/**
 * Session duration in minutes between the first and last message, rounded
 * to two decimals. Returns 0 for fewer than two messages or when either
 * timestamp is missing or unparseable.
 */
export function calculateDurationMinutes(messages: readonly Message[]): number {
  if (messages.length < 2) {
    return 0;
  }

  const first = messages[0]?.timestamp;
  const last = messages[messages.length - 1]?.timestamp;
  if (!first || !last) {
    return 0;
  }

  const start = parseTimestamp(first);
  const end = parseTimestamp(last);
  if (start === null || end === null) {
    return 0;
  }

  const minutes = (end - start) / 1000 / 60;
  return Math.round(minutes * 100) / 100;
}

/**
 * Informational indicators; none of them affect classification.
 */
export function deriveSuccessIndicators(patterns: SessionPatterns, turnCount: number): SuccessIndicator[] {
  const indicators: SuccessIndicator[] = [];

  if (patterns.implementation.totalFileOps > 0) {
    indicators.push('Files Modified');
  }
  if (patterns.errorRecovery.recoveryRate > GOOD_RECOVERY_RATE) {
    indicators.push('Good Error Recovery');
  }
  if (patterns.validation.hasValidation) {
    indicators.push('Validated');
  }
  if (turnCount > SUBSTANTIAL_TURN_COUNT) {
    indicators.push('Substantial Work');
  }

  return indicators;
}

/**
 * Parent session id: the session directory name up to its first `-`,
 * or '' when the name has none.
 */
export function extractParentSessionId(sessionDir: string): string {
  const dirName = basename(sessionDir);
  if (!dirName.includes('-')) {
    return '';
  }
  return dirName.split('-')[0] ?? '';
}

/**
 * Project slug: the metadata path after its last `/projects/`, cut at the
 * first `/sessions/`.
 */
export function extractProject(metadataPath: string): string {
  const afterProjects = metadataPath.split('/projects/').at(-1) ?? metadataPath;
  return afterProjects.split('/sessions/')[0] ?? '';
}

/**
 * Build the Session Record for one session.
 *
 * @param raw - Session as supplied by the loader
 * @param patterns - Detector output for raw.messages
 * @param classification - Classifier output for patterns
 * @returns The record, or null when the session must be skipped
 */
export function summarizeSession(
  raw: RawSession,
  patterns: SessionPatterns,
  classification: ApproachClassification
): SessionRecord | null {
  const { metadata, messages } = raw;
  if (!metadata || messages.length === 0) {
    return null;
  }

  return {
    sessionId: metadata.sessionId,
    parentSessionId: extractParentSessionId(raw.sessionDir),
    created: metadata.created,
    name: metadata.name,
    description: truncateCodePoints(metadata.description, MAX_DESCRIPTION_LENGTH),
    bundle: metadata.bundle,
    model: metadata.model,
    turnCount: metadata.turnCount,
    messageCount: messages.length,
    durationMinutes: calculateDurationMinutes(messages),
    approaches: classification.approaches,
    primaryApproach: classification.primaryApproach,
    patterns,
    successIndicators: deriveSuccessIndicators(patterns, metadata.turnCount),
    project: extractProject(raw.metadataPath),
  };
}
