import { describe, expect, it } from 'vitest';
import { toDownloadEvents } from './chromiumDownloads';

describe('toDownloadEvents', () => {
  it('reports bytes while in progress', () => {
    expect(
      toDownloadEvents({ guid: 'g-1', state: 'inProgress', receivedBytes: 10, totalBytes: 40 }),
    ).toEqual([{ type: 'download-progress', id: 'g-1', receivedBytes: 10, totalBytes: 40 }]);
  });

  it('finishes completed and canceled downloads', () => {
    expect(
      toDownloadEvents({ guid: 'g-1', state: 'completed', receivedBytes: 40, totalBytes: 40 }),
    ).toEqual([
      { type: 'download-progress', id: 'g-1', receivedBytes: 40, totalBytes: 40 },
      { type: 'download-finished', id: 'g-1', state: 'completed' },
    ]);
    expect(
      toDownloadEvents({ guid: 'g-2', state: 'canceled', receivedBytes: 5, totalBytes: 0 })[1],
    ).toEqual({ type: 'download-finished', id: 'g-2', state: 'canceled' });
  });
});
