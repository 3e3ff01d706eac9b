/**
 * Builders for messages, sessions and records used across the test suite.
 */

import { FALLBACK_APPROACH } from '../../../src/core/classifier.js';
import type {
  Approach,
  Message,
  RawSession,
  SessionMetadata,
  SessionPatterns,
  SessionRecord,
  ToolCall,
} from '../../../src/core/types.js';

export function call(tool: string, args: ToolCall['arguments'] = {}): ToolCall {
  return { tool, arguments: args };
}

export function userText(text: string, timestamp?: string): Message {
  return { role: 'user', content: { kind: 'text', text }, toolCalls: [], timestamp };
}

export function assistantText(text: string, toolCalls: ToolCall[] = [], timestamp?: string): Message {
  return { role: 'assistant', content: { kind: 'text', text }, toolCalls, timestamp };
}

/**
 * Assistant message with block content; each entry becomes one block of that type.
 */
export function assistantBlocks(types: string[], toolCalls: ToolCall[] = []): Message {
  return {
    role: 'assistant',
    content: { kind: 'blocks', blocks: types.map((type) => ({ type, payload: {} })) },
    toolCalls,
  };
}

export function toolResult(text: string): Message {
  return { role: 'tool', content: { kind: 'text', text }, toolCalls: [] };
}

export function makeMetadata(overrides: Partial<SessionMetadata> = {}): SessionMetadata {
  return {
    sessionId: 'session-1',
    created: '2025-03-01T09:00:00',
    name: 'Test session',
    description: '',
    bundle: 'foundation',
    model: 'test-model',
    turnCount: 3,
    ...overrides,
  };
}

export function makeRawSession(overrides: Partial<RawSession> = {}): RawSession {
  return {
    metadata: makeMetadata(),
    messages: [userText('hello'), assistantText('hi')],
    sessionDir: '/home/test/.amplifier/projects/demo/sessions/abc123',
    metadataPath: '/home/test/.amplifier/projects/demo/sessions/abc123/metadata.json',
    ...overrides,
  };
}

export function emptyPatterns(): SessionPatterns {
  return {
    delegation: { delegationCount: 0, agentsUsed: [], hasDelegation: false },
    iteration: { iterationCount: 0, isIterative: false },
    exploration: { explorationToolCount: 0, parallelSearches: 0, isExploratory: false, toolsUsed: {} },
    implementation: { writeOperations: 0, editOperations: 0, totalFileOps: 0, isImplementation: false },
    errorRecovery: { errorsEncountered: 0, recoveryAttempts: 0, hasErrorRecovery: false, recoveryRate: 0 },
    planningExecution: { planningMessages: 0, executionMessages: 0, planningRatio: 0, approach: 'execution-heavy' },
    validation: { testRuns: 0, codeChecks: 0, reviews: 0, totalValidation: 0, hasValidation: false },
  };
}

export type PatternOverrides = {
  [K in keyof SessionPatterns]?: Partial<SessionPatterns[K]>;
};

export function makePatterns(overrides: PatternOverrides = {}): SessionPatterns {
  const base = emptyPatterns();
  return {
    delegation: { ...base.delegation, ...overrides.delegation },
    iteration: { ...base.iteration, ...overrides.iteration },
    exploration: { ...base.exploration, ...overrides.exploration },
    implementation: { ...base.implementation, ...overrides.implementation },
    errorRecovery: { ...base.errorRecovery, ...overrides.errorRecovery },
    planningExecution: { ...base.planningExecution, ...overrides.planningExecution },
    validation: { ...base.validation, ...overrides.validation },
  };
}

export function makeRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  const approaches: [Approach, ...Approach[]] = overrides.approaches ?? [FALLBACK_APPROACH];
  return {
    sessionId: 'session-1',
    parentSessionId: '',
    created: '2025-03-01T09:00:00',
    name: 'Test session',
    description: '',
    bundle: 'foundation',
    model: 'test-model',
    turnCount: 3,
    messageCount: 2,
    durationMinutes: 0,
    approaches,
    primaryApproach: approaches[0],
    patterns: emptyPatterns(),
    successIndicators: [],
    project: 'demo',
    ...overrides,
  };
}
