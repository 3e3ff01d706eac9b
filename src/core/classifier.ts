/**
 * Approach Classifier
 *
 * Turns the seven signal records of a session into an ordered list of
 * approach labels. Labels are checked in a fixed priority order and the
 * first one becomes the primary approach.
 *
 * @module core/classifier
 */

import type { Approach, SessionPatterns } from './types.js';

/** Label used when no detector gate fired */
export const FALLBACK_APPROACH: Approach = 'Simple/Conversational';

/**
 * Result of classifying one session.
 */
export interface ApproachClassification {
  /** Priority-ordered labels; never empty */
  approaches: [Approach, ...Approach[]];

  /** Always approaches[0] */
  primaryApproach: Approach;
}

/**
 * Classification rules in priority order.
 *
 * "Direct Implementation" is suppressed for iterative sessions: iteration
 * is checked first and an iterative session never also counts as direct.
 */
const APPROACH_RULES: ReadonlyArray<{ label: Approach; matches: (patterns: SessionPatterns) => boolean }> = [
  { label: 'Iterative Refinement', matches: (p) => p.iteration.isIterative },
  { label: 'Exploratory Investigation', matches: (p) => p.exploration.isExploratory },
  {
    label: 'Direct Implementation',
    matches: (p) => p.implementation.isImplementation && !p.iteration.isIterative,
  },
  { label: 'Multi-Agent Orchestration', matches: (p) => p.delegation.hasDelegation },
  { label: 'Error Recovery & Resilience', matches: (p) => p.errorRecovery.hasErrorRecovery },
  { label: 'Validation-Driven', matches: (p) => p.validation.hasValidation },
];

/**
 * Categorize a session's problem-solving approach(es).
 *
 * @param patterns - Signal records for the session
 * @returns Ordered labels and the primary approach
 *
 * @example
 * ```typescript
 * const { approaches, primaryApproach } = classifyApproaches(detectPatterns(messages));
 * ```
 */
export function classifyApproaches(patterns: SessionPatterns): ApproachClassification {
  const matched = APPROACH_RULES.filter((rule) => rule.matches(patterns)).map((rule) => rule.label);

  const [first, ...rest] = matched;
  const approaches: [Approach, ...Approach[]] = first === undefined ? [FALLBACK_APPROACH] : [first, ...rest];

  return {
    approaches,
    primaryApproach: approaches[0],
  };
}
