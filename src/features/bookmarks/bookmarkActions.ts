import { describeError } from '../../debugLog';
import type { BookmarkStore } from './bookmarkStore';

export type AddBookmarkResult =
  | { status: 'added'; message: string }
  | { status: 'rejected'; message: string }
  | { status: 'error'; message: string };

export function isBookmarkablePage(url: string): boolean {
  const normalized = url.trim();
  return !!normalized && normalized !== 'about:blank';
}

/**
 * Toolbar "bookmark this page" action. Unlike the store itself, it does
 * not append a URL that is already in the file.
 */
export async function addBookmarkForPage(
  store: Pick<BookmarkStore, 'add' | 'contains'>,
  url: string,
): Promise<AddBookmarkResult> {
  if (!isBookmarkablePage(url)) {
    return { status: 'rejected', message: 'Cannot add a bookmark for a blank or invalid page.' };
  }

  const normalized = url.trim();
  try {
    if (await store.contains(normalized)) {
      return { status: 'rejected', message: 'This URL is already bookmarked.' };
    }

    await store.add(normalized);
    return { status: 'added', message: `Bookmarked: ${normalized}` };
  } catch (error) {
    return { status: 'error', message: describeError(error) };
  }
}
