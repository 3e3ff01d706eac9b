/**
 * Error Recovery Detector
 *
 * Finds tool results that report a failure and checks whether the assistant
 * picks the conversation back up on the very next message.
 */

import type { ErrorRecoverySignal, Message } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

/** Substrings (lowercase) that mark a tool result as an error */
const ERROR_MARKERS = ['error', 'failed'];

export class ErrorRecoveryDetector extends ProgrammaticSignalDetector<ErrorRecoverySignal> {
  readonly name = 'error-recovery';

  detect(messages: readonly Message[]): ErrorRecoverySignal {
    let errorsEncountered = 0;
    let recoveryAttempts = 0;

    messages.forEach((message, index) => {
      if (!this.isErrorResult(message)) {
        return;
      }

      errorsEncountered += 1;

      // Recovery only counts when the assistant answers immediately
      if (messages[index + 1]?.role === 'assistant') {
        recoveryAttempts += 1;
      }
    });

    return {
      errorsEncountered,
      recoveryAttempts,
      hasErrorRecovery: errorsEncountered > 0 && recoveryAttempts > 0,
      recoveryRate: errorsEncountered > 0 ? recoveryAttempts / errorsEncountered : 0,
    };
  }

  private isErrorResult(message: Message): boolean {
    if (message.role !== 'tool') {
      return false;
    }

    const content = this.lowercaseContent(message.content);
    return ERROR_MARKERS.some((marker) => content.includes(marker));
  }
}
