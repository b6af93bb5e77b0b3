import { promises as fs } from 'fs';
import path from 'path';
import { describeError, logDebug } from '../../debugLog';

export const BOOKMARKS_FILE = 'bookmarks.txt';

export type BookmarkOperation = 'add' | 'list' | 'remove';

export class BookmarkStoreError extends Error {
  readonly operation: BookmarkOperation;
  readonly filePath: string;

  constructor(operation: BookmarkOperation, filePath: string, cause: unknown) {
    super(`Could not ${operation} bookmarks in ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'BookmarkStoreError';
    this.operation = operation;
    this.filePath = filePath;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function parseBookmarkLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Flat-file bookmark list, one URL per line. The file is read on every
 * call; nothing is kept in memory between operations.
 */
export class BookmarkStore {
  constructor(readonly filePath: string) {}

  /** Appends `url` trimmed. Empty or multi-line input is rejected. */
  async add(url: string): Promise<void> {
    const line = url.trim();
    if (!line) {
      throw this.fail('add', new Error('the URL is empty'));
    }
    if (/[\r\n]/.test(line)) {
      throw this.fail('add', new Error('the URL spans several lines'));
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${line}\n`, 'utf-8');
    } catch (error) {
      throw this.fail('add', error);
    }
    logDebug('bookmarks', 'add', { url: line });
  }

  async list(): Promise<string[]> {
    const lines = await this.readLines('list');
    return lines ?? [];
  }

  async remove(url: string): Promise<void> {
    const lines = (await this.readLines('remove')) ?? [];
    const kept = lines.filter((line) => line !== url);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, kept.map((line) => `${line}\n`).join(''), 'utf-8');
    } catch (error) {
      throw this.fail('remove', error);
    }
    logDebug('bookmarks', 'remove', { url, removed: lines.length - kept.length });
  }

  async contains(url: string): Promise<boolean> {
    const lines = await this.list();
    return lines.includes(url);
  }

  private async readLines(operation: BookmarkOperation): Promise<string[] | null> {
    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      return parseBookmarkLines(raw);
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw this.fail(operation, error);
    }
  }

  private fail(operation: BookmarkOperation, error: unknown): BookmarkStoreError {
    const failure = new BookmarkStoreError(operation, this.filePath, error);
    logDebug('bookmarks', 'operation-failed', { operation, error: failure.message });
    return failure;
  }
}
