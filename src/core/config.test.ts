import { promises as fs } from 'node:fs';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  getAppConfigPath,
  readAppConfig,
  readEnvOverrides,
  resolveConfig,
} from './config.js';
import { ConfigError } from './errors.js';

const originalEnv = { ...process.env };
let base = '';

beforeEach(async () => {
  base = await fs.mkdtemp(path.join(tmpdir(), 'indystats-config-'));
  process.env.XDG_CONFIG_HOME = path.join(base, 'config');
  process.env.XDG_DATA_HOME = path.join(base, 'data');
  process.env.APPDATA = path.join(base, 'config');
  process.env.LOCALAPPDATA = path.join(base, 'data');
});

afterEach(() => {
  process.env = { ...originalEnv };
});

async function writeConfig(contents: string) {
  const configPath = getAppConfigPath('indystats');
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, contents, 'utf-8');
}

describe('readAppConfig', () => {
  it('returns an empty config when the file is missing', async () => {
    await expect(readAppConfig('indystats')).resolves.toEqual({});
  });

  it('reads known keys and ignores the rest', async () => {
    await writeConfig(JSON.stringify({ outputDir: 'exports', requestDelayMs: 0, theme: 'dark' }));
    await expect(readAppConfig('indystats')).resolves.toEqual({
      outputDir: 'exports',
      requestDelayMs: 0,
    });
  });

  it('rejects invalid JSON', async () => {
    await writeConfig('{ nope');
    await expect(readAppConfig('indystats')).rejects.toBeInstanceOf(ConfigError);
  });

  it('names the offending key', async () => {
    await writeConfig(JSON.stringify({ timeoutMs: -5 }));
    await expect(readAppConfig('indystats')).rejects.toThrow(/timeoutMs:/);
  });
});

describe('readEnvOverrides', () => {
  it('coerces numeric variables and skips blank ones', () => {
    expect(
      readEnvOverrides({
        INDYSTATS_REQUEST_DELAY_MS: '50',
        INDYSTATS_TIMEOUT_MS: ' ',
        INDYSTATS_BASE_URL: 'http://localhost:8080/stats',
      }),
    ).toEqual({
      outputDir: undefined,
      requestDelayMs: 50,
      timeoutMs: undefined,
      baseUrl: 'http://localhost:8080/stats',
    });
  });

  it('rejects a non-numeric delay', () => {
    expect(() => readEnvOverrides({ INDYSTATS_REQUEST_DELAY_MS: 'soon' })).toThrow(
      /INDYSTATS_REQUEST_DELAY_MS/,
    );
  });
});

describe('resolveConfig', () => {
  it('falls back to defaults', async () => {
    const config = await resolveConfig({ env: {}, cwd: '/work' });
    expect(config).toMatchObject({
      outputDir: path.resolve('/work', 'output'),
      requestDelayMs: 200,
      timeoutMs: 10_000,
      baseUrl: 'https://www.indycar.com/Services/IndyStats.svc',
    });
  });

  it('lets the environment override the config file', async () => {
    await writeConfig(JSON.stringify({ outputDir: 'from-file', timeoutMs: 5000 }));
    const config = await resolveConfig({
      env: { INDYSTATS_OUTPUT_DIR: 'from-env' },
      cwd: '/work',
    });
    expect(config.outputDir).toBe(path.resolve('/work', 'from-env'));
    expect(config.timeoutMs).toBe(5000);
  });
});
