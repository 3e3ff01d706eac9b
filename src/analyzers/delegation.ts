/**
 * Delegation Detector
 *
 * Detects sessions where work is handed to sub-agents, either because the
 * user asked for an agent ("use the zen-architect agent") or because the
 * assistant invoked an agent/delegate tool directly.
 */

import type { DelegationSignal, Message } from '../core/types.js';
import { ProgrammaticSignalDetector } from './base.js';

/** Captures the token following "use" as a candidate agent name */
const AGENT_NAME_PATTERN = /use\s+(\S+)/i;

/** Substrings that mark a tool call as a delegation */
const DELEGATION_TOOL_MARKERS = ['agent', 'delegate'];

/**
 * Detector for agent delegation.
 *
 * Counts:
 * - User requests mentioning both "use " and "agent" (plain-text messages only)
 * - Assistant tool calls whose name contains "agent" or "delegate"
 */
export class DelegationDetector extends ProgrammaticSignalDetector<DelegationSignal> {
  readonly name = 'delegation';

  detect(messages: readonly Message[]): DelegationSignal {
    const agentsUsed = new Set<string>();
    let delegationCount = 0;

    for (const message of messages) {
      if (message.role === 'user' && message.content.kind === 'text') {
        const text = message.content.text;
        const lowered = text.toLowerCase();

        if (lowered.includes('use ') && lowered.includes('agent')) {
          delegationCount += 1;

          const match = AGENT_NAME_PATTERN.exec(text);
          if (match?.[1]) {
            agentsUsed.add(match[1]);
          }
        }
      }

      if (message.role === 'assistant') {
        for (const call of message.toolCalls) {
          if (DELEGATION_TOOL_MARKERS.some((marker) => call.tool.includes(marker))) {
            delegationCount += 1;
          }
        }
      }
    }

    return {
      delegationCount,
      agentsUsed: [...agentsUsed],
      hasDelegation: delegationCount > 0,
    };
  }
}
