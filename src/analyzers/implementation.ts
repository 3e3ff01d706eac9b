/**
 * Implementation Detector
 *
 * Tallies file writes and edits issued by the assistant.
 */

import type { ImplementationSignal, Message } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

const WRITE_TOOL = 'write_file';
const EDIT_TOOL = 'edit_file';

/** Minimum file operations for a session to count as implementation work */
const MIN_FILE_OPS = 3;

export class ImplementationDetector extends ProgrammaticSignalDetector<ImplementationSignal> {
  readonly name = 'implementation';

  detect(messages: readonly Message[]): ImplementationSignal {
    let writeOperations = 0;
    let editOperations = 0;

    for (const call of this.assistantToolCalls(messages)) {
      if (call.tool === WRITE_TOOL) {
        writeOperations += 1;
      } else if (call.tool === EDIT_TOOL) {
        editOperations += 1;
      }
    }

    const totalFileOps = writeOperations + editOperations;

    return {
      writeOperations,
      editOperations,
      totalFileOps,
      isImplementation: totalFileOps >= MIN_FILE_OPS,
    };
  }
}
