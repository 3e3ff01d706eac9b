/**
 * Detector infrastructure for programmatic pattern detection.
 *
 * Every detector scans the full ordered message sequence of one session and
 * returns a fixed-shape signal record. Detectors hold no mutable state, so
 * they can run in any order, or in parallel, and always return the same
 * record for the same transcript.
 */

import type { Message, MessageContent, ToolCall } from '../core/types.js';

/**
 * Interface for signal detectors.
 *
 * @template TSignal - Shape of the signal record this detector produces
 */
export interface SignalDetector<TSignal> {
  /** Unique name for this detector */
  readonly name: string;

  /**
   * Scan a transcript and produce its signal record.
   *
   * @param messages - Ordered messages of one session
   */
  detect(messages: readonly Message[]): TSignal;
}

/**
 * Base class for programmatic signal detectors.
 *
 * Provides the message helpers shared by the concrete detectors.
 *
 * @example
 * ```typescript
 * class MyDetector extends ProgrammaticSignalDetector<{ count: number }> {
 *   readonly name = 'my-detector';
 *
 *   detect(messages: readonly Message[]): { count: number } {
 *     return { count: this.assistantToolCalls(messages).length };
 *   }
 * }
 * ```
 */
export abstract class ProgrammaticSignalDetector<TSignal> implements SignalDetector<TSignal> {
  abstract readonly name: string;

  abstract detect(messages: readonly Message[]): TSignal;

  /**
   * All tool calls issued by assistant messages, in transcript order.
   */
  protected assistantToolCalls(messages: readonly Message[]): ToolCall[] {
    const calls: ToolCall[] = [];

    for (const message of messages) {
      if (message.role !== 'assistant') {
        continue;
      }
      calls.push(...message.toolCalls);
    }

    return calls;
  }

  /**
   * Lowercased string form of a message body, used for keyword matching.
   */
  protected lowercaseContent(content: MessageContent): string {
    return stringifyContent(content).toLowerCase();
  }
}

/**
 * String form of a message body: the text itself for plain messages,
 * the JSON serialization of the block list otherwise.
 */
export function stringifyContent(content: MessageContent): string {
  if (content.kind === 'text') {
    return content.text;
  }

  return JSON.stringify(
    content.blocks.map((block) => ({ type: block.type, ...block.payload }))
  );
}

/**
 * Serialized tool arguments, used for substring matching. String arguments
 * are matched as recorded.
 */
export function stringifyArguments(args: ToolCall['arguments']): string {
  return typeof args === 'string' ? args : JSON.stringify(args);
}
