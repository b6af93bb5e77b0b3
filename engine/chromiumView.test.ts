import type { Protocol } from 'puppeteer-core';
import { describe, expect, it } from 'vitest';
import { isErrorDocument, readHistoryState } from './chromiumView';

function entry(id: number, url: string, title: string): Protocol.Page.NavigationEntry {
  return { id, url, userTypedURL: url, title, transitionType: 'typed' };
}

describe('readHistoryState', () => {
  const entries = [
    entry(1, 'https://one.example/', 'One'),
    entry(2, 'https://two.example/', 'Two'),
    entry(3, 'https://three.example/', 'Three'),
  ];

  it('reads the current entry and both directions', () => {
    expect(readHistoryState({ currentIndex: 1, entries })).toEqual({
      url: 'https://two.example/',
      title: 'Two',
      canGoBack: true,
      canGoForward: true,
    });
  });

  it('reports the ends of history', () => {
    expect(readHistoryState({ currentIndex: 0, entries })).toMatchObject({
      canGoBack: false,
      canGoForward: true,
    });
    expect(readHistoryState({ currentIndex: 2, entries })).toMatchObject({
      canGoBack: true,
      canGoForward: false,
    });
  });

  it('copes with an empty history', () => {
    expect(readHistoryState({ currentIndex: -1, entries: [] })).toEqual({
      url: '',
      title: '',
      canGoBack: false,
      canGoForward: false,
    });
  });
});

describe('isErrorDocument', () => {
  it('recognizes the engine error page', () => {
    expect(isErrorDocument('chrome-error://chromewebdata/')).toBe(true);
    expect(isErrorDocument('https://example.test/')).toBe(false);
  });
});
