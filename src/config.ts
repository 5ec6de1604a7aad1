import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from './errors.js';

export const APP_NAME = 'modpack-manifests';
export const API_KEY_ENV = 'CURSEFORGE_API_KEY';
export const CACHE_DIR_ENV = 'MODPACK_MANIFESTS_CACHE_DIR';

type Env = Record<string, string | undefined>;

interface PlatformContext {
  platform: NodeJS.Platform;
  home: string;
  env: Env;
}

function currentPlatform(): PlatformContext {
  return { platform: process.platform, home: os.homedir(), env: process.env };
}

/** Cache directory: explicit flag, then the environment, then the platform convention. */
export function resolveCacheDirectory(explicit?: string, context: PlatformContext = currentPlatform()): string {
  if (explicit && explicit.trim().length > 0) return explicit.trim();
  const fromEnv = context.env[CACHE_DIR_ENV]?.trim();
  if (fromEnv) return fromEnv;

  const { platform, home, env } = context;
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Caches', APP_NAME);
  }
  if (platform === 'win32') {
    return path.join(env.LOCALAPPDATA ?? path.join(home, 'AppData', 'Local'), APP_NAME, 'Cache');
  }
  return path.join(env.XDG_CACHE_HOME || path.join(home, '.cache'), APP_NAME);
}

export function resolveConfigDirectory(context: PlatformContext = currentPlatform()): string {
  const { platform, home, env } = context;
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_NAME);
  }
  if (platform === 'win32') {
    return path.join(env.APPDATA ?? path.join(home, 'AppData', 'Roaming'), APP_NAME, 'Config');
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_NAME);
}

/** Reads the catalog API key from the environment, falling back to a key file. */
export async function resolveApiKey(keyFile?: string, env: Env = process.env): Promise<string> {
  const fromEnv = env[API_KEY_ENV]?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  const filePath = keyFile ?? path.join(resolveConfigDirectory(), 'api-key');
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`${API_KEY_ENV} is not set and no API key file exists at ${filePath}.`);
    }
    throw error;
  }

  const key = contents.trim();
  if (!key) {
    throw new ConfigError(`API key file ${filePath} is empty.`);
  }
  return key;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}
