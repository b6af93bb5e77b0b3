import { v4 as uuidv4 } from 'uuid';
import type { NavigableView, Unsubscribe, ViewEvent, ViewFactory } from '../../engineBridge';
import { describeError, logDebug } from '../../debugLog';
import type { ResolvedTarget } from '../address/resolveAddress';
import type { LastTabBehavior } from '../settings/browserSettings';
import { getDisplayAddress, getDisplayHost } from './displayTitle';
import type { ChromeState, Tab, TabHandle, TabsSnapshot } from './types';

export const APP_NAME = 'Tabshell';

export type TabManagerOptions = {
  homePage: string;
  newTabPage: string;
  lastTabBehavior: LastTabBehavior;
  onQuitRequested?: () => void;
};

type TabEntry = {
  tab: Tab;
  view: NavigableView;
  unsubscribe: Unsubscribe;
};

const EMPTY_CHROME: ChromeState = {
  addressText: '',
  canGoBack: false,
  canGoForward: false,
  statusMessage: 'Ready',
  progress: null,
  windowTitle: APP_NAME,
};

export function formatWindowTitle(title: string): string {
  return `${APP_NAME} - ${title.trim() || 'New Tab'}`;
}

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Ordered collection of tabs, one engine view each. Mirrors view signals
 * into per-tab state and into the chrome of whichever tab is active.
 */
export class TabManager {
  private entries: TabEntry[] = [];
  private activeId: TabHandle = '';
  private chrome: ChromeState = EMPTY_CHROME;
  private snapshot: TabsSnapshot = { tabs: [], activeId: '', chrome: EMPTY_CHROME };
  private readonly listeners = new Set<() => void>();
  private readonly closing = new Set<TabHandle>();
  private statusTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly engine: ViewFactory,
    private readonly options: TabManagerOptions,
  ) {}

  subscribe = (listener: () => void): Unsubscribe => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): TabsSnapshot => this.snapshot;

  get tabCount(): number {
    return this.entries.length;
  }

  activeUrl(): string {
    const entry = this.activeEntry();
    if (!entry) return '';
    return entry.view.currentUrl() || entry.tab.url;
  }

  async openTab(target?: ResolvedTarget | null): Promise<TabHandle> {
    const url = target?.value ?? this.options.newTabPage;
    const view = await this.engine.createView();
    const entry = this.attachView(view, url);
    logDebug('tabs', 'open', { tabId: entry.tab.id, url });

    void this.runViewCommand(entry, 'Load', (view) => view.load(url));
    return entry.tab.id;
  }

  adoptView(view: NavigableView): TabHandle {
    const entry = this.attachView(view, view.currentUrl());
    logDebug('tabs', 'adopt', { tabId: entry.tab.id, url: entry.tab.url });
    return entry.tab.id;
  }

  async closeTab(handle: TabHandle): Promise<void> {
    await this.detach(handle, true);
  }

  activate(handle: TabHandle): void {
    const entry = this.findEntry(handle);
    if (!entry) return;

    this.activeId = handle;
    this.clearStatusTimer();
    this.chrome = this.chromeFor(entry);
    this.emit();
    void this.runViewCommand(entry, 'Switch', (view) => view.show());
  }

  activateRelative(delta: 1 | -1): void {
    if (!this.entries.length) return;
    const currentIndex = this.entries.findIndex((entry) => entry.tab.id === this.activeId);
    const safeCurrentIndex = currentIndex >= 0 ? currentIndex : 0;
    const nextIndex = (safeCurrentIndex + delta + this.entries.length) % this.entries.length;
    this.activate(this.entries[nextIndex].tab.id);
  }

  activateIndex(number: number): void {
    if (!Number.isInteger(number) || number < 1 || number > 9) return;
    if (!this.entries.length) return;
    const index = number === 9 ? this.entries.length - 1 : number - 1;
    const entry = this.entries[index];
    if (!entry) return;
    this.activate(entry.tab.id);
  }

  async navigate(target: ResolvedTarget | null): Promise<void> {
    const entry = this.activeEntry();
    if (!target || !entry) return;

    this.updateTab(entry, { url: target.value });
    this.chrome = { ...this.chrome, addressText: getDisplayAddress(target.value) };
    this.emit();
    await this.runViewCommand(entry, 'Load', (view) => view.load(target.value));
  }

  goHome(): Promise<void> {
    return this.navigate({ kind: 'url', value: this.options.homePage });
  }

  goBack(): Promise<void> {
    return this.runOnActive('Back', (view) => view.goBack());
  }

  goForward(): Promise<void> {
    return this.runOnActive('Forward', (view) => view.goForward());
  }

  reload(): Promise<void> {
    return this.runOnActive('Reload', (view) => view.reload());
  }

  stop(): Promise<void> {
    return this.runOnActive('Stop', (view) => view.stop());
  }

  setStatus(message: string, timeoutMs?: number): void {
    this.clearStatusTimer();
    this.chrome = { ...this.chrome, statusMessage: message };
    this.emit();

    if (timeoutMs === undefined || timeoutMs <= 0) return;
    this.statusTimer = setTimeout(() => {
      this.statusTimer = null;
      this.chrome = { ...this.chrome, statusMessage: '' };
      this.emit();
    }, timeoutMs);
    this.statusTimer.unref();
  }

  dispose(): void {
    this.clearStatusTimer();
    for (const entry of this.entries) {
      entry.unsubscribe();
    }
    this.listeners.clear();
  }

  private attachView(view: NavigableView, url: string): TabEntry {
    const id = uuidv4();
    const entry: TabEntry = {
      tab: { id, url, title: view.title(), isLoading: false, progress: null },
      view,
      unsubscribe: () => undefined,
    };
    entry.unsubscribe = view.subscribe((event) => this.handleViewEvent(id, event));
    this.entries = [...this.entries, entry];
    this.activate(id);
    return entry;
  }

  private async detach(handle: TabHandle, closeView: boolean): Promise<void> {
    const entry = this.findEntry(handle);
    if (!entry || this.closing.has(handle)) return;

    if (this.entries.length === 1) {
      if (this.options.lastTabBehavior === 'quit') {
        logDebug('tabs', 'last-tab-quit', { tabId: handle });
        this.options.onQuitRequested?.();
        return;
      }

      this.closing.add(handle);
      try {
        await this.openTab();
      } catch (error) {
        this.closing.delete(handle);
        this.setStatus(`Could not open a new tab: ${describeError(error)}`);
        logDebug('tabs', 'replace-last-tab-failed', { error: describeError(error) });
        return;
      }
    }

    this.closing.add(handle);
    const index = this.entries.indexOf(entry);
    const wasActive = handle === this.activeId;
    this.entries = this.entries.filter((candidate) => candidate !== entry);
    entry.unsubscribe();
    logDebug('tabs', 'close', { tabId: handle, closeView });

    if (wasActive) {
      const next = this.entries[index - 1] ?? this.entries[0];
      if (next) this.activate(next.tab.id);
      else this.emit();
    } else {
      this.emit();
    }

    if (closeView) {
      await this.runViewCommand(entry, 'Close', (view) => view.close());
    }
    this.closing.delete(handle);
  }

  private handleViewEvent(id: TabHandle, event: ViewEvent): void {
    const entry = this.findEntry(id);
    if (!entry) return;
    const isActive = id === this.activeId;

    switch (event.type) {
      case 'load-started':
        this.updateTab(entry, { isLoading: true, progress: 0 });
        if (isActive) {
          this.updateChrome({ statusMessage: `Loading ${getDisplayHost(event.url)}`, progress: 0 });
        }
        break;
      case 'load-progress': {
        const progress = clampProgress(event.progress);
        this.updateTab(entry, { progress: progress < 100 ? progress : null });
        if (isActive) {
          this.updateChrome(
            progress < 100
              ? { statusMessage: `Loading... ${progress}%`, progress }
              : { statusMessage: entry.tab.url, progress: null },
          );
        }
        break;
      }
      case 'navigation-finished':
        this.updateTab(entry, { url: event.url, isLoading: false, progress: null });
        if (isActive) {
          this.updateChrome({
            ...this.historyState(entry.view),
            addressText: getDisplayAddress(event.url),
            statusMessage: event.url,
            progress: null,
          });
        }
        break;
      case 'load-failed':
        this.updateTab(entry, { isLoading: false, progress: null });
        logDebug('tabs', 'load-failed', { tabId: id, url: event.url, error: event.error });
        if (isActive) {
          this.updateChrome({
            ...this.historyState(entry.view),
            statusMessage: `Failed to load ${event.url}: ${event.error}`,
            progress: null,
          });
        }
        break;
      case 'title-changed':
        this.updateTab(entry, { title: event.title });
        if (isActive) {
          this.updateChrome({ windowTitle: formatWindowTitle(event.title) });
        }
        break;
      case 'url-changed':
        this.updateTab(entry, { url: event.url });
        if (isActive) {
          this.updateChrome({
            ...this.historyState(entry.view),
            addressText: getDisplayAddress(event.url),
          });
        }
        break;
      case 'closed':
        void this.detach(id, false);
        return;
    }

    this.emit();
  }

  private chromeFor(entry: TabEntry): ChromeState {
    const { tab } = entry;
    const progress = tab.isLoading ? tab.progress : null;
    return {
      ...this.historyState(entry.view),
      addressText: getDisplayAddress(tab.url),
      statusMessage: progress !== null ? `Loading... ${progress}%` : tab.url,
      progress,
      windowTitle: formatWindowTitle(tab.title),
    };
  }

  private historyState(view: NavigableView): Pick<ChromeState, 'canGoBack' | 'canGoForward'> {
    return { canGoBack: view.canGoBack(), canGoForward: view.canGoForward() };
  }

  private updateTab(entry: TabEntry, patch: Partial<Omit<Tab, 'id'>>): void {
    entry.tab = { ...entry.tab, ...patch };
  }

  private updateChrome(patch: Partial<ChromeState>): void {
    this.clearStatusTimer();
    this.chrome = { ...this.chrome, ...patch };
  }

  private runOnActive(label: string, command: (view: NavigableView) => Promise<void>): Promise<void> {
    const entry = this.activeEntry();
    if (!entry) return Promise.resolve();
    return this.runViewCommand(entry, label, command);
  }

  private runViewCommand(
    entry: TabEntry,
    label: string,
    command: (view: NavigableView) => Promise<void>,
  ): Promise<void> {
    return command(entry.view).catch((error: unknown) => {
      const message = describeError(error);
      logDebug('tabs', 'view-command-failed', { tabId: entry.tab.id, command: label, error: message });
      if (entry.tab.id === this.activeId) {
        this.setStatus(`${label} failed: ${message}`);
      }
    });
  }

  private activeEntry(): TabEntry | undefined {
    return this.findEntry(this.activeId);
  }

  private findEntry(handle: TabHandle): TabEntry | undefined {
    return this.entries.find((entry) => entry.tab.id === handle);
  }

  private clearStatusTimer(): void {
    if (!this.statusTimer) return;
    clearTimeout(this.statusTimer);
    this.statusTimer = null;
  }

  private emit(): void {
    this.snapshot = {
      tabs: this.entries.map((entry) => entry.tab),
      activeId: this.activeId,
      chrome: this.chrome,
    };
    for (const listener of this.listeners) {
      listener();
    }
  }
}
