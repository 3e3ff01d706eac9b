/**
 * Planning vs Execution Detector
 *
 * Compares the number of `thinking` blocks (planning) with `tool_call`
 * blocks (execution) across assistant messages that carry structured content.
 * Plain-text assistant messages contribute nothing.
 */

import type { Message, PlanningApproach, PlanningExecutionSignal } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

const PLANNING_BLOCK = 'thinking';
const EXECUTION_BLOCK = 'tool_call';

/** Ratio above which a session is planning-heavy */
const PLANNING_HEAVY_RATIO = 0.6;

/** Ratio below which a session is execution-heavy */
const EXECUTION_HEAVY_RATIO = 0.3;

export function classifyPlanningRatio(ratio: number): PlanningApproach {
  if (ratio > PLANNING_HEAVY_RATIO) {
    return 'planning-heavy';
  }
  if (ratio < EXECUTION_HEAVY_RATIO) {
    return 'execution-heavy';
  }
  return 'balanced';
}

export class PlanningExecutionDetector extends ProgrammaticSignalDetector<PlanningExecutionSignal> {
  readonly name = 'planning-execution';

  detect(messages: readonly Message[]): PlanningExecutionSignal {
    let planningMessages = 0;
    let executionMessages = 0;

    for (const message of messages) {
      if (message.role !== 'assistant' || message.content.kind !== 'blocks') {
        continue;
      }

      for (const block of message.content.blocks) {
        if (block.type === PLANNING_BLOCK) {
          planningMessages += 1;
        } else if (block.type === EXECUTION_BLOCK) {
          executionMessages += 1;
        }
      }
    }

    const total = planningMessages + executionMessages;
    const planningRatio = total > 0 ? planningMessages / total : 0;

    return {
      planningMessages,
      executionMessages,
      planningRatio,
      approach: classifyPlanningRatio(planningRatio),
    };
  }
}
