import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { SettingsError } from './errors';

const APP_DIR_NAME = 'git-identities';
const SETTINGS_FILE_NAME = 'settings.json';

export const settingsSchema = z
  .object({
    storePath: z.string().trim().min(1).optional(),
    actionTimeoutMs: z.number().int().positive().max(60_000).default(2000),
    hydrateOnStartup: z.boolean().default(true),
    gitPath: z.string().trim().min(1).default('git'),
    logFile: z.string().trim().min(1).optional()
  })
  .strict();

export type SettingsFile = z.infer<typeof settingsSchema>;

export type Settings = {
  configDir: string;
  storePath: string;
  actionTimeoutMs: number;
  hydrateOnStartup: boolean;
  gitPath: string;
  logFile: string;
};

export const getConfigDir = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string => {
  const override = env.GIT_IDENTITIES_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }

  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) {
    return path.join(xdg, APP_DIR_NAME);
  }

  if (platform === 'win32') {
    const appData = env.APPDATA?.trim();
    return path.join(appData || path.join(home, 'AppData', 'Roaming'), APP_DIR_NAME);
  }

  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_DIR_NAME);
  }

  return path.join(home, '.config', APP_DIR_NAME);
};

export const parseSettings = (raw: unknown, configDir: string, filePath: string): Settings => {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${key}: ${issue.message}`;
    });
    throw new SettingsError(filePath, issues);
  }

  const file = result.data;
  return {
    configDir,
    storePath: path.resolve(configDir, file.storePath ?? 'identities.json'),
    actionTimeoutMs: file.actionTimeoutMs,
    hydrateOnStartup: file.hydrateOnStartup,
    gitPath: file.gitPath,
    logFile: path.resolve(configDir, file.logFile ?? `${APP_DIR_NAME}.log`)
  };
};

export const loadSettings = (configDir: string = getConfigDir()): Settings => {
  const filePath = path.join(configDir, SETTINGS_FILE_NAME);

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return parseSettings({}, configDir, filePath);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SettingsError(filePath, ['not valid JSON'], { cause: error });
  }

  return parseSettings(raw, configDir, filePath);
};

let cached: Settings | undefined;

export const getSettings = (): Settings => {
  cached ??= loadSettings();
  return cached;
};

export const getStorePath = (): string => {
  return getSettings().storePath;
};

export const getActionTimeoutMs = (): number => {
  return getSettings().actionTimeoutMs;
};

export const isHydrateOnStartupEnabled = (): boolean => {
  return getSettings().hydrateOnStartup;
};

export const getGitPath = (): string => {
  return getSettings().gitPath;
};

export const getLogFile = (): string => {
  return getSettings().logFile;
};

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};
