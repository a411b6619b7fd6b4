import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './indystats-api.js';
import { DEFAULT_REQUEST_DELAY_MS } from './sessions.js';
import { getConfigDir, getDataDir } from './xdg.js';

export const APP_NAME = 'indystats';
const CONFIG_FILENAME = 'config.json';
const DEFAULT_OUTPUT_DIR = 'output';

const appConfigSchema = z.object({
  outputDir: z.string().trim().min(1).optional(),
  requestDelayMs: z.number().int().min(0).optional(),
  timeoutMs: z.number().int().positive().optional(),
  baseUrl: z.string().url().optional(),
});

export type AppConfig = z.output<typeof appConfigSchema>;

const envSchema = z.object({
  INDYSTATS_OUTPUT_DIR: z.string().trim().min(1).optional(),
  INDYSTATS_REQUEST_DELAY_MS: z.coerce.number().int().min(0).optional(),
  INDYSTATS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  INDYSTATS_BASE_URL: z.string().url().optional(),
});

export type ResolvedConfig = {
  outputDir: string;
  requestDelayMs: number;
  timeoutMs: number;
  baseUrl: string;
  dataDir: string;
  configPath: string;
};

export type ResolveConfigOptions = {
  appName?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

export function getAppConfigPath(appName: string = APP_NAME): string {
  return path.join(getConfigDir(appName), CONFIG_FILENAME);
}

export async function readAppConfig(appName: string = APP_NAME): Promise<AppConfig> {
  const configPath = getAppConfigPath(appName);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Invalid JSON in ${configPath}`, configPath);
  }
  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${configPath}: ${describeIssues(result.error)}`, configPath);
  }
  return result.data;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('INDYSTATS_') && value !== undefined && value.trim() !== '',
    ),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(result.error)}`);
  }
  const vars = result.data;
  return {
    outputDir: vars.INDYSTATS_OUTPUT_DIR,
    requestDelayMs: vars.INDYSTATS_REQUEST_DELAY_MS,
    timeoutMs: vars.INDYSTATS_TIMEOUT_MS,
    baseUrl: vars.INDYSTATS_BASE_URL,
  };
}

/** Environment beats config.json, which beats the built-in defaults. */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  const appName = options.appName ?? APP_NAME;
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const file = await readAppConfig(appName);
  const fromEnv = readEnvOverrides(env);

  return {
    outputDir: path.resolve(cwd, fromEnv.outputDir ?? file.outputDir ?? DEFAULT_OUTPUT_DIR),
    requestDelayMs: fromEnv.requestDelayMs ?? file.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS,
    timeoutMs: fromEnv.timeoutMs ?? file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    baseUrl: fromEnv.baseUrl ?? file.baseUrl ?? DEFAULT_BASE_URL,
    dataDir: getDataDir(appName),
    configPath: getAppConfigPath(appName),
  };
}
