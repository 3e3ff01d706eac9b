import { beforeEach, describe, expect, test } from 'vitest';
import { Formatter } from '../../src/cli/formatter.js';

describe('Formatter', () => {
  let out: string[];
  let err: string[];
  let formatter: Formatter;

  beforeEach(() => {
    out = [];
    err = [];
    formatter = new Formatter({
      noColor: true,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    });
  });

  test('status messages carry their indicator', () => {
    formatter.success('Done');
    formatter.info('Note');
    formatter.warning('Careful');

    expect(out).toEqual(['✓ Done', 'ℹ Note', '⚠ Careful']);
    expect(err).toEqual([]);
  });

  test('errors go to the error writer', () => {
    formatter.error('Bad');

    expect(err).toEqual(['✗ Bad']);
    expect(out).toEqual([]);
  });

  test('header is underlined to its length', () => {
    formatter.header('Summary');

    expect(out).toEqual(['\nSummary', '=======']);
  });

  test('table pads keys to the widest key', () => {
    formatter.table([
      ['Total', 3],
      ['Avg turns', 4.5],
    ]);

    expect(out).toEqual(['  Total    : 3', '  Avg turns: 4.5']);
  });

  test('list uses indent and bullet options', () => {
    formatter.list(['a', 'b']);
    formatter.list(['c'], { indent: 4, bullet: '*' });

    expect(out).toEqual(['  - a', '  - b', '    * c']);
  });

  test('newline writes an empty line', () => {
    formatter.newline();

    expect(out).toEqual(['']);
  });

  test('stopping an idle spinner writes nothing', () => {
    formatter.spinner('Working').stop();

    expect(out).toEqual([]);
  });
});
