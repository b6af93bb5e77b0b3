import { type CDPSession, type HTTPRequest, type Page, type Protocol } from 'puppeteer-core';
import type { NavigableView, Unsubscribe, ViewEvent, ViewEventListener } from '../src/engineBridge';
import { describeError, logDebug } from '../src/debugLog';

// A navigation that turned into a download is aborted by the engine.
export const DOWNLOAD_ABORTED_ERROR = 'net::ERR_ABORTED';
const ERROR_DOCUMENT_PREFIX = 'chrome-error://';
const GENERIC_LOAD_ERROR = 'The page could not be loaded';
const DOM_READY_PROGRESS = 60;

export type HistoryState = {
  url: string;
  title: string;
  canGoBack: boolean;
  canGoForward: boolean;
};

type LoadFailure = {
  url: string;
  error: string;
};

export function readHistoryState(history: Protocol.Page.GetNavigationHistoryResponse): HistoryState {
  const { currentIndex, entries } = history;
  const current = entries[currentIndex];
  return {
    url: current?.url ?? '',
    title: current?.title ?? '',
    canGoBack: currentIndex > 0,
    canGoForward: currentIndex >= 0 && currentIndex < entries.length - 1,
  };
}

export function isErrorDocument(url: string): boolean {
  return url.startsWith(ERROR_DOCUMENT_PREFIX);
}

export type ChromiumViewOptions = {
  userAgent: string;
};

/**
 * One engine page. Load state comes from the main frame's CDP lifecycle
 * events; url, title and history availability are read back from the
 * page's navigation history.
 */
export class ChromiumView implements NavigableView {
  private state: HistoryState;
  private loading = false;
  private pendingUrl: string | null = null;
  private failure: LoadFailure | null = null;
  private readonly listeners = new Set<ViewEventListener>();

  private constructor(
    private readonly page: Page,
    private readonly session: CDPSession,
    private readonly mainFrameId: string,
    readonly targetId: string,
    initialState: HistoryState,
  ) {
    this.state = initialState;
  }

  static async attach(page: Page, options: ChromiumViewOptions): Promise<ChromiumView> {
    const session = await page.createCDPSession();
    await session.send('Page.enable');
    const [{ frameTree }, { targetInfo }, history] = await Promise.all([
      session.send('Page.getFrameTree'),
      session.send('Target.getTargetInfo'),
      session.send('Page.getNavigationHistory'),
    ]);
    if (options.userAgent) {
      await page.setUserAgent(options.userAgent);
    }

    const view = new ChromiumView(
      page,
      session,
      frameTree.frame.id,
      targetInfo.targetId,
      readHistoryState(history),
    );
    view.listen();
    return view;
  }

  async load(url: string): Promise<void> {
    this.pendingUrl = url;
    this.failure = null;
    const result = await this.session.send('Page.navigate', { url });
    if (result.errorText && result.errorText !== DOWNLOAD_ABORTED_ERROR) {
      this.failure = { url, error: result.errorText };
    }
  }

  goBack(): Promise<void> {
    return this.goToHistoryOffset(-1);
  }

  goForward(): Promise<void> {
    return this.goToHistoryOffset(1);
  }

  async stop(): Promise<void> {
    await this.session.send('Page.stopLoading');
  }

  async reload(): Promise<void> {
    this.failure = null;
    await this.session.send('Page.reload');
  }

  async show(): Promise<void> {
    await this.page.bringToFront();
  }

  async close(): Promise<void> {
    if (this.page.isClosed()) return;
    await this.page.close();
  }

  currentUrl(): string {
    return this.state.url;
  }

  title(): string {
    return this.state.title;
  }

  canGoBack(): boolean {
    return this.state.canGoBack;
  }

  canGoForward(): boolean {
    return this.state.canGoForward;
  }

  subscribe(listener: ViewEventListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Target-level url or title updates, forwarded by the engine. */
  handleTargetInfoChanged(info: Protocol.Target.TargetInfo): void {
    if (info.url === this.state.url && info.title === this.state.title) return;
    void this.refresh();
  }

  private listen(): void {
    this.session.on('Page.frameStartedLoading', (event) => {
      if (event.frameId !== this.mainFrameId) return;
      this.loading = true;
      this.emit({ type: 'load-started', url: this.pendingUrl ?? this.state.url });
    });
    this.session.on('Page.domContentEventFired', () => {
      if (!this.loading) return;
      this.emit({ type: 'load-progress', progress: DOM_READY_PROGRESS });
    });
    this.session.on('Page.loadEventFired', () => {
      if (!this.loading) return;
      this.emit({ type: 'load-progress', progress: 100 });
    });
    this.session.on('Page.frameStoppedLoading', (event) => {
      if (event.frameId !== this.mainFrameId) return;
      void this.finishLoading();
    });
    this.session.on('Page.navigatedWithinDocument', (event) => {
      if (event.frameId !== this.mainFrameId) return;
      void this.refresh();
    });

    this.page.on('framenavigated', (frame) => {
      if (frame !== this.page.mainFrame()) return;
      void this.refresh();
    });
    this.page.on('requestfailed', (request: HTTPRequest) => {
      if (!request.isNavigationRequest() || request.frame() !== this.page.mainFrame()) return;
      const errorText = request.failure()?.errorText;
      if (!errorText || errorText === DOWNLOAD_ABORTED_ERROR) return;
      this.failure = { url: request.url(), error: errorText };
    });
    this.page.once('close', () => {
      this.loading = false;
      this.emit({ type: 'closed' });
    });
  }

  private async finishLoading(): Promise<void> {
    if (!this.loading) return;
    this.loading = false;

    const failure =
      this.failure ??
      (isErrorDocument(this.page.url())
        ? { url: this.pendingUrl ?? this.state.url, error: GENERIC_LOAD_ERROR }
        : null);
    this.failure = null;
    this.pendingUrl = null;

    await this.refresh();
    if (failure) {
      this.emit({ type: 'load-failed', url: failure.url, error: failure.error });
    } else {
      this.emit({ type: 'navigation-finished', url: this.state.url });
    }
  }

  private async goToHistoryOffset(offset: -1 | 1): Promise<void> {
    const { currentIndex, entries } = await this.session.send('Page.getNavigationHistory');
    const entry = entries[currentIndex + offset];
    if (!entry) return;

    this.pendingUrl = entry.url;
    this.failure = null;
    await this.session.send('Page.navigateToHistoryEntry', { entryId: entry.id });
  }

  private async refresh(): Promise<void> {
    let next: HistoryState;
    try {
      next = readHistoryState(await this.session.send('Page.getNavigationHistory'));
    } catch (error) {
      if (!this.page.isClosed()) {
        logDebug('engine', 'history-read-failed', { targetId: this.targetId, error: describeError(error) });
      }
      return;
    }

    const previous = this.state;
    this.state = next;
    if (
      next.url !== previous.url ||
      next.canGoBack !== previous.canGoBack ||
      next.canGoForward !== previous.canGoForward
    ) {
      this.emit({ type: 'url-changed', url: next.url });
    }
    if (next.title !== previous.title) {
      this.emit({ type: 'title-changed', title: next.title });
    }
  }

  private emit(event: ViewEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
