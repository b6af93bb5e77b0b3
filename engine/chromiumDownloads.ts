import { promises as fs } from 'fs';
import path from 'path';
import type { CDPSession, Protocol } from 'puppeteer-core';
import type {
  DownloadEvent,
  DownloadEventListener,
  DownloadSource,
  Unsubscribe,
} from '../src/engineBridge';

export function toDownloadEvents(progress: Protocol.Browser.DownloadProgressEvent): DownloadEvent[] {
  const bytes: DownloadEvent = {
    type: 'download-progress',
    id: progress.guid,
    receivedBytes: progress.receivedBytes,
    totalBytes: progress.totalBytes,
  };
  if (progress.state === 'inProgress') {
    return [bytes];
  }

  return [
    bytes,
    {
      type: 'download-finished',
      id: progress.guid,
      state: progress.state === 'completed' ? 'completed' : 'canceled',
    },
  ];
}

/**
 * Browser-wide download feed over CDP. Chrome writes each download into
 * the staging directory under its guid.
 */
export class ChromiumDownloadSource implements DownloadSource {
  private readonly listeners = new Set<DownloadEventListener>();

  private constructor(
    private readonly session: CDPSession,
    private readonly stagingDir: string,
  ) {
    session.on('Browser.downloadWillBegin', (event) => {
      this.emit({
        type: 'download-requested',
        id: event.guid,
        url: event.url,
        suggestedFilename: event.suggestedFilename,
      });
    });
    session.on('Browser.downloadProgress', (event) => {
      for (const downloadEvent of toDownloadEvents(event)) {
        this.emit(downloadEvent);
      }
    });
  }

  static async create(session: CDPSession, stagingDir: string): Promise<ChromiumDownloadSource> {
    await fs.mkdir(stagingDir, { recursive: true });
    await session.send('Browser.setDownloadBehavior', {
      behavior: 'allowAndName',
      downloadPath: stagingDir,
      eventsEnabled: true,
    });
    return new ChromiumDownloadSource(session, stagingDir);
  }

  subscribe(listener: DownloadEventListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async cancel(id: string): Promise<void> {
    await this.session.send('Browser.cancelDownload', { guid: id });
  }

  stagedFilePath(id: string): string {
    return path.join(this.stagingDir, id);
  }

  private emit(event: DownloadEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
