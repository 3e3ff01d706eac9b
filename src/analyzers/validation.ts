/**
 * Validation Detector
 *
 * Counts assistant tool calls that run tests, static checks or reviews.
 * A single call can count as both a test run and a review.
 */

import type { Message, ValidationSignal } from '../core/types.js';
import { ProgrammaticSignalDetector, stringifyArguments } from './base.js';

const CHECK_TOOL = 'python_check';

export class ValidationDetector extends ProgrammaticSignalDetector<ValidationSignal> {
  readonly name = 'validation';

  detect(messages: readonly Message[]): ValidationSignal {
    let testRuns = 0;
    let codeChecks = 0;
    let reviews = 0;

    for (const call of this.assistantToolCalls(messages)) {
      const tool = call.tool.toLowerCase();
      const args = stringifyArguments(call.arguments).toLowerCase();

      if (args.includes('test') || tool.includes('test')) {
        testRuns += 1;
      }
      if (call.tool === CHECK_TOOL) {
        codeChecks += 1;
      }
      if (args.includes('review') || tool.includes('review')) {
        reviews += 1;
      }
    }

    const totalValidation = testRuns + codeChecks + reviews;

    return {
      testRuns,
      codeChecks,
      reviews,
      totalValidation,
      hasValidation: totalValidation > 0,
    };
  }
}
