import { promises as fs } from 'fs';
import path from 'path';
import type { DownloadEvent, DownloadSource, Unsubscribe } from '../../engineBridge';
import { describeError, logDebug } from '../../debugLog';
import { downloadsReducer, type DownloadsAction, type DownloadsState } from './downloadsReducer';
import type { DownloadItem } from './types';

export const DOWNLOAD_STATUS_TIMEOUT_MS = 3000;

export type DownloadManagerOptions = {
  downloadDirectory: string;
  notify: (message: string, timeoutMs?: number) => void;
  /** Resolves to an error message, empty on success. */
  openPath: (filePath: string) => Promise<string>;
};

export function sanitizeFileNameFragment(value: string): string {
  const withoutReservedChars = value.replace(/[<>:"/\\|?*]+/g, ' ');
  const withoutControlChars = Array.from(withoutReservedChars)
    .filter((char) => char.charCodeAt(0) >= 32)
    .join('');
  return withoutControlChars.replace(/\s+/g, ' ').trim();
}

function getDownloadFileName(suggestedFilename: string, url: string): string {
  const suggested = sanitizeFileNameFragment(suggestedFilename);
  if (suggested) return suggested;

  try {
    const lastSegment = new URL(url).pathname.split('/').filter(Boolean).pop() ?? '';
    const fromUrl = sanitizeFileNameFragment(decodeURIComponent(lastSegment));
    if (fromUrl) return fromUrl;
  } catch {
    // Fall through to the generic name.
  }
  return 'download';
}

async function moveFile(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (typeof error !== 'object' || error === null || !('code' in error) || error.code !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(from, to);
    await fs.unlink(from);
  }
}

/**
 * Pairs the engine's download feed with the user's save-path and
 * open-file answers. A download is finalized once it is both accepted
 * and complete on the engine side, whichever happens last.
 */
export class DownloadManager {
  private state: DownloadsState = [];
  private readonly listeners = new Set<() => void>();
  private readonly unsubscribeSource: Unsubscribe;

  constructor(
    private readonly source: DownloadSource,
    private readonly options: DownloadManagerOptions,
  ) {
    this.unsubscribeSource = source.subscribe((event) => this.handleEvent(event));
  }

  subscribe = (listener: () => void): Unsubscribe => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): DownloadItem[] => this.state;

  find(id: string): DownloadItem | undefined {
    return this.state.find((d) => d.id === id);
  }

  defaultSavePath(id: string): string {
    const item = this.find(id);
    return path.join(this.options.downloadDirectory, item?.filename ?? 'download');
  }

  async accept(id: string, savePath: string): Promise<void> {
    const item = this.find(id);
    if (!item || item.status !== 'pending') return;

    const target = savePath.trim();
    if (!target) {
      await this.cancel(id);
      return;
    }

    this.dispatch({ type: 'ACCEPT', payload: { id, savePath: path.resolve(target) } });
    this.options.notify(`Downloading: ${item.filename}`);
    logDebug('downloads', 'accepted', { id, savePath: target });

    if (item.engineFinished) {
      await this.finalize(id);
    }
  }

  async cancel(id: string): Promise<void> {
    const item = this.find(id);
    if (!item || (item.status !== 'pending' && item.status !== 'in-progress')) return;

    this.dispatch({ type: 'CANCEL', payload: { id, endedAt: Date.now() } });
    if (item.status === 'pending') {
      this.options.notify('Download cancelled.');
    } else {
      this.options.notify(`Download cancelled: ${item.filename}`, DOWNLOAD_STATUS_TIMEOUT_MS);
    }
    logDebug('downloads', 'canceled', { id });

    try {
      if (!item.engineFinished) {
        await this.source.cancel(id);
      }
      await fs.rm(this.source.stagedFilePath(id), { force: true });
    } catch (error) {
      logDebug('downloads', 'cancel-cleanup-failed', { id, error: describeError(error) });
    }
  }

  async answerOpenPrompt(id: string, open: boolean): Promise<void> {
    const item = this.find(id);
    if (!item || !item.openPromptPending) return;

    this.dispatch({ type: 'PROMPT_ANSWERED', payload: { id } });
    if (open) {
      await this.openFile(id);
    }
  }

  async openFile(id: string): Promise<void> {
    const item = this.find(id);
    if (!item || item.status !== 'completed' || !item.savePath) return;

    const error = await this.options.openPath(item.savePath);
    if (error) {
      this.options.notify(`Could not open ${item.filename}: ${error}`, DOWNLOAD_STATUS_TIMEOUT_MS);
      logDebug('downloads', 'open-failed', { id, error });
    }
  }

  dispose(): void {
    this.unsubscribeSource();
    this.listeners.clear();
  }

  private handleEvent(event: DownloadEvent): void {
    switch (event.type) {
      case 'download-requested': {
        const item: DownloadItem = {
          id: event.id,
          url: event.url,
          filename: getDownloadFileName(event.suggestedFilename, event.url),
          totalBytes: 0,
          receivedBytes: 0,
          status: 'pending',
          startedAt: Date.now(),
          engineFinished: false,
          openPromptPending: false,
        };
        this.dispatch({ type: 'ADD', payload: item });
        logDebug('downloads', 'requested', { id: event.id, url: event.url });
        return;
      }
      case 'download-progress':
        this.dispatch({
          type: 'PROGRESS',
          payload: { id: event.id, receivedBytes: event.receivedBytes, totalBytes: event.totalBytes },
        });
        return;
      case 'download-finished':
        void this.handleFinished(event.id, event.state);
        return;
    }
  }

  private async handleFinished(id: string, state: 'completed' | 'canceled'): Promise<void> {
    const item = this.find(id);
    if (!item || item.status === 'canceled') return;

    if (state === 'canceled') {
      this.fail(item, 'Download interrupted');
      return;
    }

    this.dispatch({ type: 'ENGINE_DONE', payload: { id } });
    if (item.status === 'in-progress') {
      await this.finalize(id);
    }
  }

  private async finalize(id: string): Promise<void> {
    const item = this.find(id);
    if (!item || item.status !== 'in-progress' || !item.savePath) return;

    try {
      await moveFile(this.source.stagedFilePath(id), item.savePath);
    } catch (error) {
      if (this.find(id)?.status !== 'in-progress') return;
      this.fail(item, describeError(error));
      return;
    }

    // Canceled while the file was moving.
    if (this.find(id)?.status !== 'in-progress') {
      try {
        await fs.rm(item.savePath, { force: true });
      } catch (error) {
        logDebug('downloads', 'cancel-cleanup-failed', { id, error: describeError(error) });
      }
      return;
    }

    this.dispatch({ type: 'DONE', payload: { id, endedAt: Date.now() } });
    this.options.notify(`Download complete: ${item.filename}`, DOWNLOAD_STATUS_TIMEOUT_MS);
    logDebug('downloads', 'completed', { id, savePath: item.savePath });
  }

  private fail(item: DownloadItem, error: string): void {
    this.dispatch({ type: 'ERROR', payload: { id: item.id, error, endedAt: Date.now() } });
    this.options.notify(`Download failed: ${item.filename}`, DOWNLOAD_STATUS_TIMEOUT_MS);
    logDebug('downloads', 'failed', { id: item.id, error });
  }

  private dispatch(action: DownloadsAction): void {
    this.state = downloadsReducer(this.state, action);
    for (const listener of this.listeners) {
      listener();
    }
  }
}
