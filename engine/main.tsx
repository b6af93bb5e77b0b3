import { promises as fs } from 'fs';
import { render } from 'ink';
import App from '../src/App';
import { configureDebugLog, describeError, logDebug } from '../src/debugLog';
import { BookmarkStore } from '../src/features/bookmarks/bookmarkStore';
import { DownloadManager } from '../src/features/downloads/DownloadManager';
import { TabManager } from '../src/features/tabs/TabManager';
import { syncTerminalTitle } from '../src/terminalTitle';
import { ChromiumEngine } from './chromium';
import {
  getBookmarksFilePath,
  getDataDir,
  getDebugLogPath,
  getProfileDir,
  getStagingDir,
} from './paths';
import { loadSettings, resolveDownloadDirectory } from './settings';
import { openPath } from './shell';

async function main(): Promise<void> {
  const dataDir = getDataDir();
  await fs.mkdir(dataDir, { recursive: true });
  configureDebugLog(getDebugLogPath(dataDir));

  const settings = await loadSettings(dataDir);
  if (!settings.debugLogging) {
    configureDebugLog(null);
  }
  logDebug('startup', 'settings-loaded', { dataDir, searchEngine: settings.searchEngine });

  const engine = await ChromiumEngine.launch({
    executablePath: settings.browserExecutablePath,
    userDataDir: getProfileDir(dataDir),
    stagingDir: getStagingDir(dataDir),
    userAgent: settings.userAgent,
  });

  let quit = () => {
    logDebug('startup', 'quit-before-render');
  };

  const tabs = new TabManager(engine, {
    homePage: settings.homePage,
    newTabPage: settings.newTabPage,
    lastTabBehavior: settings.lastTabBehavior,
    onQuitRequested: () => quit(),
  });
  const downloads = new DownloadManager(engine.downloads, {
    downloadDirectory: resolveDownloadDirectory(settings),
    notify: (message, timeoutMs) => tabs.setStatus(message, timeoutMs),
    openPath,
  });
  const bookmarks = new BookmarkStore(getBookmarksFilePath(dataDir));

  const stopAdopting = engine.onViewOpened((view) => {
    tabs.adoptView(view);
  });
  const stopTitleSync = syncTerminalTitle(tabs, process.stdout);

  try {
    await tabs.openTab({ kind: 'url', value: settings.homePage });

    const app = render(
      <App
        tabs={tabs}
        downloads={downloads}
        bookmarks={bookmarks}
        searchOptions={settings}
        onQuit={() => quit()}
      />,
    );
    quit = () => app.unmount();
    const stopDisconnected = engine.onDisconnected(() => app.unmount());

    await app.waitUntilExit();
    stopDisconnected();
  } finally {
    stopTitleSync();
    stopAdopting();
    downloads.dispose();
    tabs.dispose();
    await engine.close();
    logDebug('startup', 'exit');
  }
}

void main().catch((error: unknown) => {
  const message = describeError(error);
  logDebug('startup', 'failed', { error: message });
  console.error(`Tabshell could not start: ${message}`);
  process.exitCode = 1;
});
