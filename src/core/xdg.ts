import os from 'node:os';
import path from 'node:path';

export type AppDirKind = 'data' | 'config';

type DirRule = {
  env: string;
  homeSuffix: string[];
  leaf: string[];
  windowsEnv: string[];
  windowsHomeSuffix: string[];
};

const RULES: Record<AppDirKind, DirRule> = {
  data: {
    env: 'XDG_DATA_HOME',
    homeSuffix: ['.local', 'share'],
    leaf: ['data'],
    windowsEnv: ['LOCALAPPDATA', 'APPDATA'],
    windowsHomeSuffix: ['AppData', 'Local'],
  },
  config: {
    env: 'XDG_CONFIG_HOME',
    homeSuffix: ['.config'],
    leaf: [],
    windowsEnv: ['APPDATA'],
    windowsHomeSuffix: ['AppData', 'Roaming'],
  },
};

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim().length > 0 ? value : null;
}

function homeDir(): string {
  const home = nonEmpty(process.env.HOME) ?? nonEmpty(os.homedir().trim());
  if (home === null) {
    throw new Error('Unable to determine a home directory for indystats files.');
  }
  return home;
}

/** Per-user directory for the app, following XDG on unix and AppData on Windows. */
export function resolveAppDir(kind: AppDirKind, appName: string): string {
  const rule = RULES[kind];
  if (process.platform === 'win32') {
    const fromEnv = rule.windowsEnv.map((name) => nonEmpty(process.env[name])).find(Boolean);
    const base = fromEnv ?? path.join(homeDir(), ...rule.windowsHomeSuffix);
    return path.join(base, appName, ...rule.leaf);
  }
  const xdg = nonEmpty(process.env[rule.env]);
  const base = xdg ?? path.join(homeDir(), ...rule.homeSuffix);
  return path.join(base, appName, ...rule.leaf);
}

export function getDataDir(appName: string): string {
  return resolveAppDir('data', appName);
}

export function getConfigDir(appName: string): string {
  return resolveAppDir('config', appName);
}
