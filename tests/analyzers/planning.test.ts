import { describe, test, expect } from 'vitest';
import { PlanningExecutionDetector, classifyPlanningRatio } from '../../src/analyzers/planning.js';
import type { Message } from '../../src/core/types.js';
import { assistantBlocks, assistantText } from '../core/mocks/builders.js';

describe('PlanningExecutionDetector', () => {
  const detector = new PlanningExecutionDetector();

  test('mostly thinking blocks is planning-heavy', () => {
    const signal = detector.detect([assistantBlocks(['thinking', 'thinking', 'thinking', 'tool_call'])]);

    expect(signal).toEqual({
      planningMessages: 3,
      executionMessages: 1,
      planningRatio: 0.75,
      approach: 'planning-heavy',
    });
  });

  test('a ratio between the thresholds is balanced', () => {
    const signal = detector.detect([assistantBlocks(['thinking', 'tool_call']), assistantBlocks(['tool_call'])]);

    expect(signal.planningRatio).toBeCloseTo(1 / 3);
    expect(signal.approach).toBe('balanced');
  });

  test('mostly tool_call blocks is execution-heavy', () => {
    const signal = detector.detect([assistantBlocks(['thinking', 'tool_call', 'tool_call', 'tool_call', 'tool_call'])]);

    expect(signal.planningRatio).toBe(0.2);
    expect(signal.approach).toBe('execution-heavy');
  });

  test('no blocks gives a zero ratio', () => {
    expect(detector.detect([assistantText('plain answer')])).toEqual({
      planningMessages: 0,
      executionMessages: 0,
      planningRatio: 0,
      approach: 'execution-heavy',
    });
  });

  test('ignores other block types and non-assistant messages', () => {
    const userBlocks: Message = {
      role: 'user',
      content: { kind: 'blocks', blocks: [{ type: 'thinking', payload: {} }] },
      toolCalls: [],
    };

    const signal = detector.detect([userBlocks, assistantBlocks(['text', 'thinking', 'image'])]);

    expect(signal.planningMessages).toBe(1);
    expect(signal.executionMessages).toBe(0);
    expect(signal.planningRatio).toBe(1);
  });
});

describe('classifyPlanningRatio', () => {
  test('thresholds are exclusive', () => {
    expect(classifyPlanningRatio(0.6)).toBe('balanced');
    expect(classifyPlanningRatio(0.3)).toBe('balanced');
    expect(classifyPlanningRatio(0.61)).toBe('planning-heavy');
    expect(classifyPlanningRatio(0.29)).toBe('execution-heavy');
  });
});
