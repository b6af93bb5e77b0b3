export type LastTabBehavior = 'new-tab' | 'quit';
export type SearchEngine =
  | 'google'
  | 'duckduckgo'
  | 'bing'
  | 'yahoo'
  | 'startpage'
  | 'qwant'
  | 'yandex'
  | 'brave'
  | 'ecosia';

export const SEARCH_ENGINES: ReadonlyArray<SearchEngine> = [
  'google',
  'duckduckgo',
  'bing',
  'yahoo',
  'startpage',
  'qwant',
  'yandex',
  'brave',
  'ecosia',
];

export type SearchEngineShortcutChars = Record<SearchEngine, string>;

export const DEFAULT_SEARCH_ENGINE_SHORTCUT_PREFIX = '!';

export const DEFAULT_SEARCH_ENGINE_SHORTCUT_CHARS: SearchEngineShortcutChars = {
  google: 'g',
  duckduckgo: 'd',
  bing: 'b',
  yahoo: 'y',
  startpage: 's',
  qwant: 'q',
  yandex: 'a',
  brave: 'r',
  ecosia: 'e',
};

export type BrowserSettings = {
  homePage: string;
  newTabPage: string;
  searchEngine: SearchEngine;
  searchEngineShortcutsEnabled: boolean;
  searchEngineShortcutPrefix: string;
  lastTabBehavior: LastTabBehavior;
  userAgent: string;
  browserExecutablePath: string;
  downloadDirectory: string;
  debugLogging: boolean;
};

export const DEFAULT_BROWSER_SETTINGS: BrowserSettings = {
  homePage: 'https://duckduckgo.com/',
  newTabPage: 'https://duckduckgo.com/',
  searchEngine: 'duckduckgo',
  searchEngineShortcutsEnabled: false,
  searchEngineShortcutPrefix: DEFAULT_SEARCH_ENGINE_SHORTCUT_PREFIX,
  lastTabBehavior: 'new-tab',
  userAgent: '',
  browserExecutablePath: '',
  downloadDirectory: '',
  debugLogging: true,
};

function normalizePage(value: unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback;

  const normalized = value.trim();
  if (!normalized) return fallback;

  return normalized;
}

function normalizeOptionalText(value: unknown): string {
  if (typeof value !== 'string') return '';
  return value.trim();
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value !== 'boolean') {
    return fallback;
  }

  return value;
}

function normalizeSearchEngine(value: unknown): SearchEngine {
  return (
    SEARCH_ENGINES.find((engine) => engine === value) ?? DEFAULT_BROWSER_SETTINGS.searchEngine
  );
}

function normalizeSearchEngineShortcutPrefix(value: unknown): string {
  if (typeof value !== 'string') {
    return DEFAULT_BROWSER_SETTINGS.searchEngineShortcutPrefix;
  }

  const normalized = value.trim();
  if (!normalized) {
    return DEFAULT_BROWSER_SETTINGS.searchEngineShortcutPrefix;
  }

  return normalized[0];
}

function normalizeLastTabBehavior(value: unknown): LastTabBehavior {
  if (value === 'new-tab' || value === 'quit') {
    return value;
  }

  return DEFAULT_BROWSER_SETTINGS.lastTabBehavior;
}

function readField(value: object, key: keyof BrowserSettings): unknown {
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

export function normalizeBrowserSettings(value: unknown): BrowserSettings {
  if (typeof value !== 'object' || value === null) {
    return DEFAULT_BROWSER_SETTINGS;
  }

  const source: object = value;
  const field = (key: keyof BrowserSettings) => readField(source, key);
  return {
    homePage: normalizePage(field('homePage'), DEFAULT_BROWSER_SETTINGS.homePage),
    newTabPage: normalizePage(field('newTabPage'), DEFAULT_BROWSER_SETTINGS.newTabPage),
    searchEngine: normalizeSearchEngine(field('searchEngine')),
    searchEngineShortcutsEnabled: normalizeBoolean(
      field('searchEngineShortcutsEnabled'),
      DEFAULT_BROWSER_SETTINGS.searchEngineShortcutsEnabled,
    ),
    searchEngineShortcutPrefix: normalizeSearchEngineShortcutPrefix(
      field('searchEngineShortcutPrefix'),
    ),
    lastTabBehavior: normalizeLastTabBehavior(field('lastTabBehavior')),
    userAgent: normalizeOptionalText(field('userAgent')),
    browserExecutablePath: normalizeOptionalText(field('browserExecutablePath')),
    downloadDirectory: normalizeOptionalText(field('downloadDirectory')),
    debugLogging: normalizeBoolean(field('debugLogging'), DEFAULT_BROWSER_SETTINGS.debugLogging),
  };
}

export function getSearchUrlForQuery(query: string, engine: SearchEngine): string {
  const searchQuery = new URLSearchParams({ q: query }).toString();

  switch (engine) {
    case 'duckduckgo':
      return `https://duckduckgo.com/?${searchQuery}`;
    case 'bing':
      return `https://www.bing.com/search?${searchQuery}`;
    case 'yahoo':
      return `https://search.yahoo.com/search?${searchQuery}`;
    case 'startpage':
      return `https://www.startpage.com/sp/search?${searchQuery}`;
    case 'qwant':
      return `https://www.qwant.com/?${searchQuery}&t=web`;
    case 'yandex':
      return `https://yandex.com/search/?${searchQuery}`;
    case 'brave':
      return `https://search.brave.com/search?${searchQuery}`;
    case 'ecosia':
      return `https://www.ecosia.org/search?${searchQuery}`;
    case 'google':
    default:
      return `https://www.google.com/search?${searchQuery}`;
  }
}

export function getSearchEngineShortcuts(
  shortcutPrefix: string,
): Array<{ shortcut: string; engine: SearchEngine }> {
  const normalizedPrefix = normalizeSearchEngineShortcutPrefix(shortcutPrefix);

  return SEARCH_ENGINES.map((engine) => ({
    shortcut: `${normalizedPrefix}${DEFAULT_SEARCH_ENGINE_SHORTCUT_CHARS[engine]}`,
    engine,
  }));
}

export function parseSearchInput(
  input: string,
  fallbackEngine: SearchEngine,
  shortcutsEnabled: boolean,
  shortcutPrefix: string,
): { query: string; engine: SearchEngine } {
  const normalizedInput = input.trim();
  if (!normalizedInput || !shortcutsEnabled) {
    return {
      query: normalizedInput,
      engine: fallbackEngine,
    };
  }

  const shortcuts = getSearchEngineShortcuts(shortcutPrefix);
  const [prefix, ...rest] = normalizedInput.split(/\s+/);
  const normalizedPrefixToken = prefix.toLowerCase();
  const shortcutMatch = shortcuts.find(
    (entry) => entry.shortcut.toLowerCase() === normalizedPrefixToken,
  );

  const queryAfterShortcut = rest.join(' ').trim();
  if (!shortcutMatch || !queryAfterShortcut) {
    return {
      query: normalizedInput,
      engine: fallbackEngine,
    };
  }

  return {
    query: queryAfterShortcut,
    engine: shortcutMatch.engine,
  };
}

export function getSearchUrlFromInput(input: string, settings: BrowserSettings): string {
  const { query, engine } = parseSearchInput(
    input,
    settings.searchEngine,
    settings.searchEngineShortcutsEnabled,
    settings.searchEngineShortcutPrefix,
  );
  return getSearchUrlForQuery(query, engine);
}
