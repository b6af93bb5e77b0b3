import { promises as fs } from 'fs';
import path from 'path';
import { describeError, logDebug } from '../src/debugLog';
import {
  DEFAULT_BROWSER_SETTINGS,
  normalizeBrowserSettings,
  type BrowserSettings,
} from '../src/features/settings/browserSettings';
import { BROWSER_PATH_ENV, getDefaultDownloadDirectory, getSettingsFilePath } from './paths';

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readSettingsFile(filePath: string): Promise<BrowserSettings> {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return normalizeBrowserSettings(parsed);
  } catch (error) {
    if (!isMissingFileError(error)) {
      logDebug('settings', 'load-failed', { filePath, error: describeError(error) });
    }
    return DEFAULT_BROWSER_SETTINGS;
  }
}

/**
 * Reads `settings.json` from the data directory. A missing or unreadable
 * file yields the defaults; environment overrides apply on top.
 */
export async function loadSettings(
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BrowserSettings> {
  const settings = await readSettingsFile(getSettingsFilePath(dataDir));
  const browserPath = env[BROWSER_PATH_ENV]?.trim();
  if (!browserPath) return settings;

  return { ...settings, browserExecutablePath: browserPath };
}

export function resolveDownloadDirectory(settings: BrowserSettings): string {
  return settings.downloadDirectory
    ? path.resolve(settings.downloadDirectory)
    : getDefaultDownloadDirectory();
}
