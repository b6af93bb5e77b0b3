/**
 * Current lifecycle status for a download entry. `pending` means the
 * engine has started it and the save location has not been chosen yet.
 */
export type DownloadStatus = 'pending' | 'in-progress' | 'completed' | 'error' | 'canceled';

/**
 * Download metadata mirrored from the engine's download feed.
 */
export interface DownloadItem {
  id: string;
  url: string;
  filename: string;
  totalBytes: number; // 0 if unknown
  receivedBytes: number;
  status: DownloadStatus;
  startedAt: number; // timestamp ms
  endedAt?: number;
  savePath?: string; // chosen by the user
  engineFinished: boolean; // the staged file is complete
  openPromptPending: boolean; // waiting for "open it?" answer
  error?: string;
}
