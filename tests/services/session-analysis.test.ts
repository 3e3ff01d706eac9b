import { describe, test, expect } from 'vitest';
import { createDefaultDetectors } from '../../src/analyzers/index.js';
import { aggregateCorpus } from '../../src/services/corpus-aggregation.js';
import { analyzeSession, analyzeSessions } from '../../src/services/session-analysis.js';
import { assistantText, call, makeMetadata, makeRawSession, toolResult, userText } from '../core/mocks/builders.js';

describe('analyzeSession', () => {
  test('excludes a session with valid metadata but no messages', () => {
    expect(analyzeSession(makeRawSession({ messages: [] }))).toBeNull();
  });

  test('classifies an error-recovery session', () => {
    const record = analyzeSession(
      makeRawSession({
        messages: [
          userText('run the build'),
          assistantText('', [call('bash', { command: 'make' })]),
          toolResult('Error: failed'),
          assistantText('The build failed, retrying'),
        ],
      })
    );

    expect(record?.patterns.errorRecovery).toEqual({
      errorsEncountered: 1,
      recoveryAttempts: 1,
      hasErrorRecovery: true,
      recoveryRate: 1,
    });
    expect(record?.approaches).toEqual(['Error Recovery & Resilience']);
    expect(record?.successIndicators).toEqual(['Good Error Recovery']);
  });
});

describe('analyzeSessions', () => {
  const raws = [
    makeRawSession({ metadata: null }),
    makeRawSession({ metadata: makeMetadata({ sessionId: 'empty' }), messages: [] }),
    makeRawSession({ metadata: makeMetadata({ sessionId: 'kept' }) }),
  ];

  test('separates records from skipped sessions', () => {
    const { records, skipped } = analyzeSessions(raws);

    expect(records.map((r) => r.sessionId)).toEqual(['kept']);
    expect(skipped).toHaveLength(2);
  });

  test('produces identical output on repeated runs', () => {
    const first = analyzeSessions(raws, createDefaultDetectors());
    const second = analyzeSessions(raws, createDefaultDetectors());

    expect(JSON.stringify(second.records)).toBe(JSON.stringify(first.records));
    expect(JSON.stringify(aggregateCorpus(second.records))).toBe(JSON.stringify(aggregateCorpus(first.records)));
  });
});
