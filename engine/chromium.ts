import puppeteer, {
  type Browser,
  type CDPSession,
  type Page,
  type PuppeteerLaunchOptions,
  TargetType,
  type Target,
} from 'puppeteer-core';
import type { BrowserEngine, NavigableView, Unsubscribe } from '../src/engineBridge';
import { describeError, logDebug } from '../src/debugLog';
import { ChromiumDownloadSource } from './chromiumDownloads';
import { ChromiumView } from './chromiumView';

const LAUNCH_ARGS = ['--no-first-run', '--no-default-browser-check'];

export type ChromiumEngineOptions = {
  /** Empty means the installed Chrome release channel. */
  executablePath: string;
  userDataDir: string;
  stagingDir: string;
  userAgent: string;
};

/**
 * Drives a headed Chrome through puppeteer-core. Every tab is one page
 * of the launched browser.
 */
export class ChromiumEngine implements BrowserEngine {
  private readonly views = new Map<string, ChromiumView>();
  private readonly openedListeners = new Set<(view: NavigableView) => void>();
  private readonly disconnectedListeners = new Set<() => void>();
  private launchPage: Page | null;

  private constructor(
    private readonly browser: Browser,
    private readonly session: CDPSession,
    readonly downloads: ChromiumDownloadSource,
    private readonly options: ChromiumEngineOptions,
    launchPage: Page | null,
  ) {
    this.launchPage = launchPage;
    this.listen();
  }

  static async launch(options: ChromiumEngineOptions): Promise<ChromiumEngine> {
    const launchOptions: PuppeteerLaunchOptions = {
      headless: false,
      defaultViewport: null,
      userDataDir: options.userDataDir,
      args: LAUNCH_ARGS,
    };
    if (options.executablePath) {
      launchOptions.executablePath = options.executablePath;
    } else {
      launchOptions.channel = 'chrome';
    }

    const browser = await puppeteer.launch(launchOptions);
    logDebug('engine', 'launched', { version: await browser.version() });

    try {
      const session = await browser.target().createCDPSession();
      await session.send('Target.setDiscoverTargets', { discover: true });
      const downloads = await ChromiumDownloadSource.create(session, options.stagingDir);
      const [launchPage] = await browser.pages();
      return new ChromiumEngine(browser, session, downloads, options, launchPage ?? null);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async createView(): Promise<NavigableView> {
    const page = this.launchPage ?? (await this.browser.newPage());
    this.launchPage = null;
    return this.track(page);
  }

  onViewOpened(listener: (view: NavigableView) => void): Unsubscribe {
    this.openedListeners.add(listener);
    return () => {
      this.openedListeners.delete(listener);
    };
  }

  onDisconnected(listener: () => void): Unsubscribe {
    this.disconnectedListeners.add(listener);
    return () => {
      this.disconnectedListeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    if (!this.browser.connected) return;
    await this.browser.close();
  }

  private async track(page: Page): Promise<ChromiumView> {
    const view = await ChromiumView.attach(page, { userAgent: this.options.userAgent });
    this.views.set(view.targetId, view);
    view.subscribe((event) => {
      if (event.type === 'closed') {
        this.views.delete(view.targetId);
      }
    });
    return view;
  }

  private listen(): void {
    this.session.on('Target.targetInfoChanged', ({ targetInfo }) => {
      this.views.get(targetInfo.targetId)?.handleTargetInfoChanged(targetInfo);
    });

    this.browser.on('targetcreated', (target: Target) => {
      if (target.type() !== TargetType.PAGE || !target.opener()) return;
      void this.adopt(target);
    });

    this.browser.once('disconnected', () => {
      logDebug('engine', 'disconnected');
      for (const listener of [...this.disconnectedListeners]) {
        listener();
      }
    });
  }

  private async adopt(target: Target): Promise<void> {
    try {
      const page = await target.page();
      if (!page) return;
      const view = await this.track(page);
      logDebug('engine', 'popup-opened', { url: target.url() });
      for (const listener of [...this.openedListeners]) {
        listener(view);
      }
    } catch (error) {
      logDebug('engine', 'popup-adopt-failed', { url: target.url(), error: describeError(error) });
    }
  }
}
