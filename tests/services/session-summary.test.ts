import { describe, test, expect } from 'vitest';
import { detectPatterns } from '../../src/analyzers/index.js';
import { classifyApproaches } from '../../src/core/classifier.js';
import {
  calculateDurationMinutes,
  deriveSuccessIndicators,
  extractParentSessionId,
  extractProject,
  parseTimestamp,
  summarizeSession,
  truncateCodePoints,
} from '../../src/services/session-summary.js';
import {
  assistantText,
  call,
  makeMetadata,
  makePatterns,
  makeRawSession,
  userText,
} from '../core/mocks/builders.js';

describe('parseTimestamp', () => {
  const tenAm = Date.UTC(2025, 2, 1, 10, 0, 0);

  test('strips a literal +00:00 suffix', () => {
    expect(parseTimestamp('2025-03-01T10:00:00+00:00')).toBe(tenAm);
  });

  test('reads a timestamp without a zone as UTC', () => {
    expect(parseTimestamp('2025-03-01T10:00:00')).toBe(tenAm);
    expect(parseTimestamp('2025-03-01T10:00:00Z')).toBe(tenAm);
  });

  test('accepts a space separator and microsecond precision', () => {
    expect(parseTimestamp('2025-03-01 10:00:00.123456')).toBe(tenAm + 123);
  });

  test('honors other offsets', () => {
    expect(parseTimestamp('2025-03-01T12:00:00+02:00')).toBe(tenAm);
  });

  test('returns null for unparseable values', () => {
    expect(parseTimestamp('not a date')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('2025-13-45T00:00:00')).toBeNull();
  });
});

describe('calculateDurationMinutes', () => {
  test('measures first to last message', () => {
    const messages = [
      userText('start', '2025-03-01T10:00:00'),
      assistantText('middle'),
      assistantText('end', [], '2025-03-01T11:00:00'),
    ];

    expect(calculateDurationMinutes(messages)).toBe(60);
  });

  test('rounds to two decimals', () => {
    const messages = [userText('a', '2025-03-01T10:00:00'), assistantText('b', [], '2025-03-01T10:01:20')];

    expect(calculateDurationMinutes(messages)).toBe(1.33);
  });

  test('mixes +00:00 and naive timestamps', () => {
    const messages = [userText('a', '2025-03-01T10:00:00+00:00'), assistantText('b', [], '2025-03-01T10:15:00')];

    expect(calculateDurationMinutes(messages)).toBe(15);
  });

  test('returns 0 when it cannot measure', () => {
    expect(calculateDurationMinutes([userText('only', '2025-03-01T10:00:00')])).toBe(0);
    expect(calculateDurationMinutes([userText('a', '2025-03-01T10:00:00'), assistantText('b')])).toBe(0);
    expect(calculateDurationMinutes([userText('a', 'yesterday'), assistantText('b', [], '2025-03-01T10:00:00')])).toBe(0);
  });
});

describe('deriveSuccessIndicators', () => {
  test('derives every indicator in order', () => {
    const patterns = makePatterns({
      implementation: { totalFileOps: 1 },
      errorRecovery: { recoveryRate: 1 },
      validation: { hasValidation: true },
    });

    expect(deriveSuccessIndicators(patterns, 6)).toEqual([
      'Files Modified',
      'Good Error Recovery',
      'Validated',
      'Substantial Work',
    ]);
  });

  test('thresholds are exclusive', () => {
    expect(deriveSuccessIndicators(makePatterns({ errorRecovery: { recoveryRate: 0.5 } }), 5)).toEqual([]);
  });
});

describe('extractParentSessionId', () => {
  test('takes the directory name up to the first dash', () => {
    expect(extractParentSessionId('/p/projects/demo/sessions/abc123-def-456')).toBe('abc123');
  });

  test('is empty when the directory name has no dash', () => {
    expect(extractParentSessionId('/p/projects/demo/sessions/abc123')).toBe('');
  });
});

describe('extractProject', () => {
  test('takes the segment between projects and sessions', () => {
    expect(extractProject('/home/test/.amplifier/projects/demo/sessions/abc/metadata.json')).toBe('demo');
  });

  test('uses the last projects segment', () => {
    expect(extractProject('/a/projects/x/projects/y/sessions/s/metadata.json')).toBe('y');
  });
});

describe('truncateCodePoints', () => {
  test('keeps short text and surrogate pairs whole', () => {
    expect(truncateCodePoints('abc', 5)).toBe('abc');
    expect(truncateCodePoints('😀😀😀', 2)).toBe('😀😀');
  });
});

describe('summarizeSession', () => {
  test('builds the record from metadata, timing and signals', () => {
    const messages = [
      userText('write the parser', '2025-03-01T09:00:00'),
      assistantText('', [call('write_file', { path: 'src/parser.ts' })], '2025-03-01T09:12:00'),
    ];
    const raw = makeRawSession({
      metadata: makeMetadata({ sessionId: 'child2', description: 'x'.repeat(250), turnCount: 8 }),
      messages,
      sessionDir: '/p/projects/demo/sessions/parent1-child2',
      metadataPath: '/p/projects/demo/sessions/parent1-child2/metadata.json',
    });
    const patterns = detectPatterns(messages);

    const record = summarizeSession(raw, patterns, classifyApproaches(patterns));

    expect(record).not.toBeNull();
    expect(record?.sessionId).toBe('child2');
    expect(record?.parentSessionId).toBe('parent1');
    expect(record?.project).toBe('demo');
    expect(record?.messageCount).toBe(2);
    expect(record?.turnCount).toBe(8);
    expect(record?.durationMinutes).toBe(12);
    expect(record?.description).toHaveLength(200);
    expect(record?.approaches).toEqual(['Simple/Conversational']);
    expect(record?.primaryApproach).toBe('Simple/Conversational');
    expect(record?.successIndicators).toEqual(['Files Modified', 'Substantial Work']);
  });

  test('truncates the description by code point', () => {
    const raw = makeRawSession({ metadata: makeMetadata({ description: 'a'.repeat(199) + '😀tail' }) });
    const patterns = detectPatterns(raw.messages);

    const record = summarizeSession(raw, patterns, classifyApproaches(patterns));

    expect(record?.description).toBe('a'.repeat(199) + '😀');
  });

  test('skips a session without metadata', () => {
    const raw = makeRawSession({ metadata: null });
    const patterns = detectPatterns(raw.messages);

    expect(summarizeSession(raw, patterns, classifyApproaches(patterns))).toBeNull();
  });

  test('skips a session without messages', () => {
    const raw = makeRawSession({ messages: [] });
    const patterns = detectPatterns([]);

    expect(summarizeSession(raw, patterns, classifyApproaches(patterns))).toBeNull();
  });
});
