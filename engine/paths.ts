import os from 'os';
import path from 'path';
import { BOOKMARKS_FILE } from '../src/features/bookmarks/bookmarkStore';

export const DATA_DIR_ENV = 'TABSHELL_DATA_DIR';
export const BROWSER_PATH_ENV = 'TABSHELL_BROWSER_PATH';

const DATA_DIR_NAME = '.tabshell';
const SETTINGS_FILE = 'settings.json';
const DEBUG_LOG_FILE = 'app-debug.log';
const STAGING_DIR_NAME = 'downloads-staging';
const PROFILE_DIR_NAME = 'profile';

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[DATA_DIR_ENV]?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), DATA_DIR_NAME);
}

export function getSettingsFilePath(dataDir: string): string {
  return path.join(dataDir, SETTINGS_FILE);
}

export function getDebugLogPath(dataDir: string): string {
  return path.join(dataDir, DEBUG_LOG_FILE);
}

export function getBookmarksFilePath(dataDir: string): string {
  return path.join(dataDir, BOOKMARKS_FILE);
}

export function getStagingDir(dataDir: string): string {
  return path.join(dataDir, STAGING_DIR_NAME);
}

/** Chrome's own user data directory (cookies, cache, engine-side history). */
export function getProfileDir(dataDir: string): string {
  return path.join(dataDir, PROFILE_DIR_NAME);
}

export function getDefaultDownloadDirectory(): string {
  return path.join(os.homedir(), 'Downloads');
}
