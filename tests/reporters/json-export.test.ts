import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { aggregateCorpus } from '../../src/services/corpus-aggregation.js';
import { buildAnalysisExport, exportToJson } from '../../src/reporters/json-export.js';
import { makeRecord } from '../core/mocks/builders.js';

describe('JSON export', () => {
  const records = [makeRecord({ sessionId: 'a' }), makeRecord({ sessionId: 'b', created: '' })];
  const summary = aggregateCorpus(records);
  const generatedAt = new Date('2025-03-05T12:00:00.000Z');
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stratify-json-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('builds the export document', () => {
    const document = buildAnalysisExport(records, summary, generatedAt);

    expect(document.generatedAt).toBe('2025-03-05T12:00:00.000Z');
    expect(document.summaryStatistics).toBe(summary);
    expect(document.sessions).toEqual(records);
  });

  test('writes indented JSON ending in a newline', async () => {
    const path = join(dir, 'session_analysis.json');

    await exportToJson(path, records, summary, generatedAt);

    const content = readFileSync(path, 'utf8');
    expect(content.endsWith('}\n')).toBe(true);
    expect(content.startsWith('{\n  "generatedAt": "2025-03-05T12:00:00.000Z",')).toBe(true);
    expect(JSON.parse(content)).toEqual(buildAnalysisExport(records, summary, generatedAt));
  });
});
