/**
 * Exploration Detector
 *
 * Identifies investigation-heavy sessions: many calls to read/search tools,
 * or several assistant turns that fan out more than one tool call at once.
 */

import type { ExplorationSignal, Message } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

export const EXPLORATION_TOOLS = ['read_file', 'glob', 'grep', 'bash', 'web_search'] as const;

/** Minimum exploration-tool calls for the gate */
const MIN_EXPLORATION_CALLS = 5;

/** Minimum multi-call assistant turns for the gate */
const MIN_PARALLEL_SEARCHES = 2;

const EXPLORATION_TOOL_SET: ReadonlySet<string> = new Set(EXPLORATION_TOOLS);

/**
 * Detector for exploratory investigation.
 *
 * Each assistant turn issuing more than one tool call counts as a parallel
 * search; calls to exploration tools are tallied per tool.
 */
export class ExplorationDetector extends ProgrammaticSignalDetector<ExplorationSignal> {
  readonly name = 'exploration';

  detect(messages: readonly Message[]): ExplorationSignal {
    const toolsUsed: Record<string, number> = {};
    let parallelSearches = 0;

    for (const message of messages) {
      if (message.role !== 'assistant') {
        continue;
      }

      if (message.toolCalls.length > 1) {
        parallelSearches += 1;
      }

      for (const call of message.toolCalls) {
        if (EXPLORATION_TOOL_SET.has(call.tool)) {
          toolsUsed[call.tool] = (toolsUsed[call.tool] ?? 0) + 1;
        }
      }
    }

    const explorationToolCount = Object.values(toolsUsed).reduce((sum, count) => sum + count, 0);

    return {
      explorationToolCount,
      parallelSearches,
      isExploratory:
        explorationToolCount >= MIN_EXPLORATION_CALLS || parallelSearches >= MIN_PARALLEL_SEARCHES,
      toolsUsed,
    };
  }
}
