/**
 * Barrel export for the detector set.
 *
 * `detectPatterns` runs all seven detectors over one transcript. Detectors
 * are independent, so the set can be swapped per key for testing.
 */

import type { Message, SessionPatterns } from '../core/types.js';
import type { SignalDetector } from './base.js';
import { DelegationDetector } from './delegation.js';
import { ErrorRecoveryDetector } from './error-recovery.js';
import { ExplorationDetector } from './exploration.js';
import { ImplementationDetector } from './implementation.js';
import { IterationDetector } from './iteration.js';
import { PlanningExecutionDetector } from './planning.js';
import { ValidationDetector } from './validation.js';

export { type SignalDetector, ProgrammaticSignalDetector, stringifyContent, stringifyArguments } from './base.js';
export { DelegationDetector } from './delegation.js';
export { IterationDetector, REFINEMENT_KEYWORDS } from './iteration.js';
export { ExplorationDetector, EXPLORATION_TOOLS } from './exploration.js';
export { ImplementationDetector } from './implementation.js';
export { ErrorRecoveryDetector } from './error-recovery.js';
export { PlanningExecutionDetector, classifyPlanningRatio } from './planning.js';
export { ValidationDetector } from './validation.js';

/**
 * One detector per signal record of SessionPatterns.
 */
export type DetectorSet = {
  [K in keyof SessionPatterns]: SignalDetector<SessionPatterns[K]>;
};

export function createDefaultDetectors(): DetectorSet {
  return {
    delegation: new DelegationDetector(),
    iteration: new IterationDetector(),
    exploration: new ExplorationDetector(),
    implementation: new ImplementationDetector(),
    errorRecovery: new ErrorRecoveryDetector(),
    planningExecution: new PlanningExecutionDetector(),
    validation: new ValidationDetector(),
  };
}

/**
 * Run every detector over a transcript.
 *
 * @param messages - Ordered messages of one session
 * @param detectors - Detector set (defaults to the standard seven)
 */
export function detectPatterns(
  messages: readonly Message[],
  detectors: DetectorSet = createDefaultDetectors()
): SessionPatterns {
  return {
    delegation: detectors.delegation.detect(messages),
    iteration: detectors.iteration.detect(messages),
    exploration: detectors.exploration.detect(messages),
    implementation: detectors.implementation.detect(messages),
    errorRecovery: detectors.errorRecovery.detect(messages),
    planningExecution: detectors.planningExecution.detect(messages),
    validation: detectors.validation.detect(messages),
  };
}
