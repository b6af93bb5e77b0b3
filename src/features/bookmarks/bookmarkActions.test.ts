import { describe, expect, it, vi } from 'vitest';
import { addBookmarkForPage, isBookmarkablePage } from './bookmarkActions';
import { BookmarkStoreError } from './bookmarkStore';

function createStore(initial: string[] = []) {
  const urls = [...initial];
  return {
    urls,
    contains: vi.fn(async (url: string) => urls.includes(url)),
    add: vi.fn(async (url: string) => {
      urls.push(url);
    }),
  };
}

describe('addBookmarkForPage', () => {
  it('adds a new page', async () => {
    const store = createStore();

    const result = await addBookmarkForPage(store, 'https://example.com/');

    expect(result).toEqual({ status: 'added', message: 'Bookmarked: https://example.com/' });
    expect(store.urls).toEqual(['https://example.com/']);
  });

  it('refuses blank pages without touching the store', async () => {
    const store = createStore();

    await expect(addBookmarkForPage(store, 'about:blank')).resolves.toEqual({
      status: 'rejected',
      message: 'Cannot add a bookmark for a blank or invalid page.',
    });
    await expect(addBookmarkForPage(store, '  ')).resolves.toMatchObject({ status: 'rejected' });
    expect(store.contains).not.toHaveBeenCalled();
  });

  it('refuses a page that is already bookmarked', async () => {
    const store = createStore(['https://example.com/']);

    const result = await addBookmarkForPage(store, 'https://example.com/');

    expect(result).toEqual({ status: 'rejected', message: 'This URL is already bookmarked.' });
    expect(store.add).not.toHaveBeenCalled();
  });

  it('turns store failures into an error result', async () => {
    const store = createStore();
    store.contains.mockRejectedValueOnce(
      new BookmarkStoreError('list', '/data/bookmarks.txt', new Error('EACCES')),
    );

    await expect(addBookmarkForPage(store, 'https://example.com/')).resolves.toEqual({
      status: 'error',
      message: 'Could not list bookmarks in /data/bookmarks.txt: EACCES',
    });
  });
});

describe('isBookmarkablePage', () => {
  it('accepts real pages only', () => {
    expect(isBookmarkablePage('https://example.com')).toBe(true);
    expect(isBookmarkablePage('about:blank')).toBe(false);
    expect(isBookmarkablePage('')).toBe(false);
  });
});
