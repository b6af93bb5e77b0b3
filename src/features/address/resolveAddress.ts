import {
  DEFAULT_BROWSER_SETTINGS,
  getSearchUrlFromInput,
  type BrowserSettings,
} from '../settings/browserSettings';

export type ResolvedTarget = {
  kind: 'url' | 'search';
  value: string;
};

export type SearchOptions = Pick<
  BrowserSettings,
  'searchEngine' | 'searchEngineShortcutsEnabled' | 'searchEngineShortcutPrefix'
>;

const SUPPORTED_SCHEMES = new Set(['http:', 'https:', 'file:', 'about:', 'data:', 'view-source:']);

export function isSupportedProtocol(value: string): boolean {
  const schemeMatch = value.match(/^([a-z][a-z0-9+.-]*:)/i);
  if (!schemeMatch) return false;
  return SUPPORTED_SCHEMES.has(schemeMatch[1].toLowerCase());
}

function looksLikeHost(value: string): boolean {
  return value.includes('.') && !/\s/.test(value);
}

/**
 * Decides whether address-bar input is a URL or a search. Returns `null`
 * for blank input, which callers treat as "do not navigate".
 */
export function resolveAddress(
  input: string,
  options: SearchOptions = DEFAULT_BROWSER_SETTINGS,
): ResolvedTarget | null {
  const raw = input.trim();
  if (!raw) return null;

  if (isSupportedProtocol(raw)) {
    return { kind: 'url', value: raw };
  }

  if (looksLikeHost(raw)) {
    return { kind: 'url', value: `https://${raw}` };
  }

  return {
    kind: 'search',
    value: getSearchUrlFromInput(raw, { ...DEFAULT_BROWSER_SETTINGS, ...options }),
  };
}
