/**
 * Iteration Detector
 *
 * Counts user turns that ask for changes to earlier work. Two or more such
 * turns mark the session as iterative refinement.
 */

import type { IterationSignal, Message } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

export const REFINEMENT_KEYWORDS = [
  'refine',
  'improve',
  'fix',
  'update',
  'revise',
  'modify',
  'adjust',
  'correct',
] as const;

/** Minimum refinement requests for a session to count as iterative */
const MIN_ITERATIONS = 2;

export class IterationDetector extends ProgrammaticSignalDetector<IterationSignal> {
  readonly name = 'iteration';

  detect(messages: readonly Message[]): IterationSignal {
    let iterationCount = 0;

    for (const message of messages) {
      if (message.role !== 'user') {
        continue;
      }

      const content = this.lowercaseContent(message.content);
      if (REFINEMENT_KEYWORDS.some((keyword) => content.includes(keyword))) {
        iterationCount += 1;
      }
    }

    return {
      iterationCount,
      isIterative: iterationCount >= MIN_ITERATIONS,
    };
  }
}
