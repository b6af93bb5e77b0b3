// ---------------------------------------------------------------
// Contract between the shell and the embedded rendering engine.
// The shell only ever talks to these interfaces; engine/ holds the
// Chromium implementation and the tests use an in-process fake.
// ---------------------------------------------------------------

export type Unsubscribe = () => void;

/**
 * Signals a single engine view pushes to the shell.
 */
export type ViewEvent =
  | { type: 'load-started'; url: string }
  | { type: 'load-progress'; progress: number }
  | { type: 'navigation-finished'; url: string }
  | { type: 'load-failed'; url: string; error: string }
  | { type: 'title-changed'; title: string }
  | { type: 'url-changed'; url: string }
  | { type: 'closed' };

export type ViewEventListener = (event: ViewEvent) => void;

/**
 * What the tab manager needs from a rendering-engine view.
 *
 * Commands resolve once the engine has taken them. A navigation that
 * fails is reported through a `load-failed` event, not a rejection.
 */
export interface NavigableView {
  load(url: string): Promise<void>;
  goBack(): Promise<void>;
  goForward(): Promise<void>;
  stop(): Promise<void>;
  reload(): Promise<void>;
  /** Brings the view to the front of the engine window. */
  show(): Promise<void>;
  close(): Promise<void>;
  currentUrl(): string;
  title(): string;
  canGoBack(): boolean;
  canGoForward(): boolean;
  subscribe(listener: ViewEventListener): Unsubscribe;
}

export type DownloadEvent =
  | { type: 'download-requested'; id: string; url: string; suggestedFilename: string }
  | { type: 'download-progress'; id: string; receivedBytes: number; totalBytes: number }
  | { type: 'download-finished'; id: string; state: 'completed' | 'canceled' };

export type DownloadEventListener = (event: DownloadEvent) => void;

/**
 * Profile-wide download feed. The engine writes every download into a
 * staging location; the shell decides where it ends up.
 */
export interface DownloadSource {
  subscribe(listener: DownloadEventListener): Unsubscribe;
  cancel(id: string): Promise<void>;
  stagedFilePath(id: string): string;
}

export interface ViewFactory {
  createView(): Promise<NavigableView>;
}

export interface BrowserEngine extends ViewFactory {
  readonly downloads: DownloadSource;
  /** Views the pages opened themselves (popups, `target=_blank`). */
  onViewOpened(listener: (view: NavigableView) => void): Unsubscribe;
  onDisconnected(listener: () => void): Unsubscribe;
  close(): Promise<void>;
}
