import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ErrorCode } from '../../src/core/types.js';
import { getDefaultConfig, readConfig, writeConfig } from '../../src/storage/config.js';
import { DEFAULT_PROJECTS_DIR } from '../../src/storage/paths.js';

describe('config', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stratify-config-'));
    configPath = join(dir, 'config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('getDefaultConfig returns the defaults', () => {
    const config = getDefaultConfig();

    expect(config.version).toBe('1.0.0');
    expect(config.projectsDir).toBe(DEFAULT_PROJECTS_DIR);
    expect(config.outputDir).toBeUndefined();
    expect(config.dashboard).toBe(false);
    expect(config.logLevel).toBe('info');
  });

  test('readConfig returns defaults when the file is missing', async () => {
    expect(await readConfig(configPath)).toEqual(getDefaultConfig());
  });

  test('readConfig completes a partial file with defaults', async () => {
    writeFileSync(configPath, JSON.stringify({ projectsDir: '/data/projects', dashboard: true }));

    const config = await readConfig(configPath);

    expect(config.projectsDir).toBe('/data/projects');
    expect(config.dashboard).toBe(true);
    expect(config.logLevel).toBe('info');
  });

  test('readConfig rejects malformed JSON', async () => {
    writeFileSync(configPath, '{ not json');

    await expect(readConfig(configPath)).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
  });

  test('readConfig rejects values outside the schema', async () => {
    writeFileSync(configPath, JSON.stringify({ logLevel: 'loud' }));

    await expect(readConfig(configPath)).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
  });

  test('writeConfig persists a config that readConfig returns unchanged', async () => {
    const nestedPath = join(dir, 'nested', 'config.json');
    const config = { ...getDefaultConfig(), outputDir: '/data/out', logLevel: 'debug' as const };

    await writeConfig(config, nestedPath);

    expect(await readConfig(nestedPath)).toEqual(config);
    expect(existsSync(`${nestedPath}.tmp`)).toBe(false);
  });
});
