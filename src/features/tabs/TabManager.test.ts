import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeEngine, flushPromises } from '../../testing/fakeEngine';
import { TabManager, formatWindowTitle } from './TabManager';

const HOME = 'https://home.example/';
const NEW_TAB = 'https://newtab.example/';

function url(value: string) {
  return { kind: 'url' as const, value };
}

describe('TabManager', () => {
  let engine: FakeEngine;
  let onQuitRequested: ReturnType<typeof vi.fn>;
  let manager: TabManager;

  beforeEach(() => {
    engine = new FakeEngine();
    onQuitRequested = vi.fn();
    manager = new TabManager(engine, {
      homePage: HOME,
      newTabPage: NEW_TAB,
      lastTabBehavior: 'new-tab',
      onQuitRequested,
    });
  });

  afterEach(() => {
    manager.dispose();
    vi.useRealTimers();
  });

  describe('openTab', () => {
    it('appends a view, activates it and navigates it', async () => {
      const handle = await manager.openTab(url('https://a.example/'));

      const { tabs, activeId, chrome } = manager.getSnapshot();
      expect(activeId).toBe(handle);
      expect(tabs).toEqual([
        { id: handle, url: 'https://a.example/', title: '', isLoading: false, progress: null },
      ]);
      expect(engine.views[0].calls).toEqual(['show', 'load https://a.example/']);
      expect(chrome.addressText).toBe('https://a.example/');
      expect(chrome.windowTitle).toBe('Tabshell - New Tab');
    });

    it('opens the new-tab page when no target is given', async () => {
      await manager.openTab();

      expect(engine.views[0].calls).toEqual(['show', `load ${NEW_TAB}`]);
      expect(manager.getSnapshot().tabs[0].url).toBe(NEW_TAB);
    });

    it('keeps tabs in opening order', async () => {
      const first = await manager.openTab(url('https://a.example/'));
      const second = await manager.openTab(url('https://b.example/'));

      expect(manager.getSnapshot().tabs.map((tab) => tab.id)).toEqual([first, second]);
      expect(manager.getSnapshot().activeId).toBe(second);
    });

    it('propagates a failure to create the view', async () => {
      engine.failNextCreate = new Error('engine gone');

      await expect(manager.openTab()).rejects.toThrow('engine gone');
      expect(manager.tabCount).toBe(0);
    });
  });

  describe('activate', () => {
    it('shows the view and refreshes the chrome from it', async () => {
      const first = await manager.openTab(url('https://a.example/'));
      await manager.openTab(url('https://b.example/'));
      engine.views[1].emit({ type: 'title-changed', title: 'B page' });
      expect(manager.getSnapshot().chrome.windowTitle).toBe('Tabshell - B page');

      manager.activate(first);

      const { chrome, activeId } = manager.getSnapshot();
      expect(activeId).toBe(first);
      expect(chrome.addressText).toBe('https://a.example/');
      expect(chrome.windowTitle).toBe('Tabshell - New Tab');
      expect(chrome.canGoBack).toBe(true);
      expect(chrome.canGoForward).toBe(false);
      expect(engine.views[0].calls).toEqual(['show', 'load https://a.example/', 'show']);
    });

    it('ignores unknown handles', async () => {
      const handle = await manager.openTab(url('https://a.example/'));

      manager.activate('missing');

      expect(manager.getSnapshot().activeId).toBe(handle);
    });

    it('cycles relative to the active tab and wraps around', async () => {
      const a = await manager.openTab(url('https://a.example/'));
      await manager.openTab(url('https://b.example/'));
      const c = await manager.openTab(url('https://c.example/'));

      manager.activateRelative(1);
      expect(manager.getSnapshot().activeId).toBe(a);

      manager.activateRelative(-1);
      expect(manager.getSnapshot().activeId).toBe(c);
    });

    it('picks tabs by number with 9 meaning the last tab', async () => {
      const a = await manager.openTab(url('https://a.example/'));
      const b = await manager.openTab(url('https://b.example/'));
      manager.activate(a);

      manager.activateIndex(9);
      expect(manager.getSnapshot().activeId).toBe(b);

      manager.activateIndex(1);
      expect(manager.getSnapshot().activeId).toBe(a);

      manager.activateIndex(0);
      manager.activateIndex(5);
      expect(manager.getSnapshot().activeId).toBe(a);
    });
  });

  describe('event mirroring', () => {
    it('mirrors the load lifecycle of the active tab', async () => {
      await manager.openTab(url('https://a.example/path'));
      const view = engine.views[0];

      view.emit({ type: 'load-started', url: 'https://a.example/path' });
      expect(manager.getSnapshot().chrome).toMatchObject({
        statusMessage: 'Loading a.example',
        progress: 0,
      });

      view.emit({ type: 'load-progress', progress: 42.4 });
      expect(manager.getSnapshot().chrome).toMatchObject({
        statusMessage: 'Loading... 42%',
        progress: 42,
      });
      expect(manager.getSnapshot().tabs[0]).toMatchObject({ isLoading: true, progress: 42 });

      view.emit({ type: 'navigation-finished', url: 'https://a.example/path' });
      expect(manager.getSnapshot().chrome).toMatchObject({
        statusMessage: 'https://a.example/path',
        addressText: 'https://a.example/path',
        progress: null,
        canGoBack: true,
      });
      expect(manager.getSnapshot().tabs[0]).toMatchObject({ isLoading: false, progress: null });
    });

    it('reports load failures in the status bar', async () => {
      await manager.openTab(url('https://nope.invalid/'));

      engine.views[0].emit({
        type: 'load-failed',
        url: 'https://nope.invalid/',
        error: 'net::ERR_NAME_NOT_RESOLVED',
      });

      expect(manager.getSnapshot().chrome.statusMessage).toBe(
        'Failed to load https://nope.invalid/: net::ERR_NAME_NOT_RESOLVED',
      );
      expect(manager.getSnapshot().chrome.progress).toBeNull();
    });

    it('updates back/forward availability when the url changes', async () => {
      await manager.openTab(url('https://a.example/'));
      const view = engine.views[0];

      await manager.goBack();
      view.emit({ type: 'url-changed', url: 'about:blank' });

      expect(manager.getSnapshot().chrome).toMatchObject({
        addressText: '',
        canGoBack: false,
        canGoForward: true,
      });
      expect(view.calls).toContain('goBack');
    });

    it('keeps inactive tab events out of the chrome', async () => {
      await manager.openTab(url('https://a.example/'));
      await manager.openTab(url('https://b.example/'));
      const before = manager.getSnapshot().chrome;

      engine.views[0].emit({ type: 'load-started', url: 'https://a.example/' });
      engine.views[0].emit({ type: 'title-changed', title: 'A page' });

      const { chrome, tabs } = manager.getSnapshot();
      expect(chrome).toEqual(before);
      expect(tabs[0]).toMatchObject({ title: 'A page', isLoading: true, progress: 0 });
    });

    it('notifies subscribers on every change', async () => {
      const listener = vi.fn();
      manager.subscribe(listener);

      await manager.openTab(url('https://a.example/'));
      const calls = listener.mock.calls.length;
      engine.views[0].emit({ type: 'title-changed', title: 'A' });

      expect(listener).toHaveBeenCalledTimes(calls + 1);
    });
  });

  describe('closeTab', () => {
    it('activates the previous tab when the active one closes', async () => {
      await manager.openTab(url('https://a.example/'));
      const b = await manager.openTab(url('https://b.example/'));
      const c = await manager.openTab(url('https://c.example/'));

      await manager.closeTab(c);

      expect(manager.getSnapshot().activeId).toBe(b);
      expect(manager.getSnapshot().tabs).toHaveLength(2);
      expect(engine.views[2].calls.at(-1)).toBe('close');
      expect(engine.views[2].listenerCount).toBe(0);
    });

    it('activates the next tab when the first tab closes', async () => {
      const a = await manager.openTab(url('https://a.example/'));
      const b = await manager.openTab(url('https://b.example/'));
      manager.activate(a);

      await manager.closeTab(a);

      expect(manager.getSnapshot().activeId).toBe(b);
    });

    it('keeps the active tab when an inactive one closes', async () => {
      const a = await manager.openTab(url('https://a.example/'));
      const b = await manager.openTab(url('https://b.example/'));

      await manager.closeTab(a);

      expect(manager.getSnapshot().activeId).toBe(b);
      expect(manager.getSnapshot().tabs.map((tab) => tab.id)).toEqual([b]);
    });

    it('replaces the last tab with a new-tab page', async () => {
      const only = await manager.openTab(url('https://a.example/'));

      await manager.closeTab(only);

      const { tabs, activeId } = manager.getSnapshot();
      expect(tabs).toHaveLength(1);
      expect(tabs[0].url).toBe(NEW_TAB);
      expect(activeId).toBe(tabs[0].id);
      expect(activeId).not.toBe(only);
      expect(engine.views[0].calls.at(-1)).toBe('close');
      expect(onQuitRequested).not.toHaveBeenCalled();
    });

    it('keeps the last tab when its replacement cannot be created', async () => {
      const only = await manager.openTab(url('https://a.example/'));
      engine.failNextCreate = new Error('boom');

      await manager.closeTab(only);

      expect(manager.getSnapshot().tabs.map((tab) => tab.id)).toEqual([only]);
      expect(manager.getSnapshot().chrome.statusMessage).toBe('Could not open a new tab: boom');
    });

    it('asks to quit instead when configured to', async () => {
      const quitting = new TabManager(engine, {
        homePage: HOME,
        newTabPage: NEW_TAB,
        lastTabBehavior: 'quit',
        onQuitRequested,
      });
      const only = await quitting.openTab(url('https://a.example/'));

      await quitting.closeTab(only);

      expect(onQuitRequested).toHaveBeenCalledTimes(1);
      expect(quitting.tabCount).toBe(1);
      expect(engine.views[0].calls).not.toContain('close');
      quitting.dispose();
    });

    it('drops tabs whose view the engine closed', async () => {
      const a = await manager.openTab(url('https://a.example/'));
      await manager.openTab(url('https://b.example/'));

      engine.views[1].emit({ type: 'closed' });
      await flushPromises();

      expect(manager.getSnapshot().tabs.map((tab) => tab.id)).toEqual([a]);
      expect(manager.getSnapshot().activeId).toBe(a);
      expect(engine.views[1].calls).not.toContain('close');
    });

    it('ignores unknown handles', async () => {
      await manager.openTab(url('https://a.example/'));

      await manager.closeTab('missing');

      expect(manager.tabCount).toBe(1);
    });
  });

  describe('navigation commands', () => {
    it('navigates the active tab and updates the address text', async () => {
      await manager.openTab(url('https://a.example/'));

      await manager.navigate({ kind: 'search', value: 'https://duckduckgo.com/?q=cats' });

      expect(engine.views[0].calls.at(-1)).toBe('load https://duckduckgo.com/?q=cats');
      expect(manager.getSnapshot().chrome.addressText).toBe('https://duckduckgo.com/?q=cats');
    });

    it('does nothing for an empty target', async () => {
      await manager.openTab(url('https://a.example/'));
      const before = [...engine.views[0].calls];

      await manager.navigate(null);

      expect(engine.views[0].calls).toEqual(before);
    });

    it('goes home', async () => {
      await manager.openTab(url('https://a.example/'));

      await manager.goHome();

      expect(engine.views[0].calls.at(-1)).toBe(`load ${HOME}`);
    });

    it('forwards reload, stop and forward to the active view', async () => {
      await manager.openTab(url('https://a.example/'));

      await manager.reload();
      await manager.stop();
      await manager.goForward();

      expect(engine.views[0].calls.slice(-3)).toEqual(['reload', 'stop', 'goForward']);
    });

    it('shows failed commands in the status bar', async () => {
      await manager.openTab(url('https://a.example/'));
      engine.views[0].failNext = new Error('Target closed');

      await manager.reload();

      expect(manager.getSnapshot().chrome.statusMessage).toBe('Reload failed: Target closed');
    });

    it('adopts views opened by pages', async () => {
      engine.onViewOpened((view) => manager.adoptView(view));
      await manager.openTab(url('https://a.example/'));

      engine.openPopup('https://popup.example/');

      const { tabs, activeId } = manager.getSnapshot();
      expect(tabs).toHaveLength(2);
      expect(tabs[1].url).toBe('https://popup.example/');
      expect(activeId).toBe(tabs[1].id);
    });

    it('reports the active url from the view', async () => {
      await manager.openTab(url('https://a.example/'));

      expect(manager.activeUrl()).toBe('https://a.example/');
    });
  });

  describe('setStatus', () => {
    it('clears a timed message after the timeout', () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });

      manager.setStatus('Download complete: report.pdf', 3000);
      expect(manager.getSnapshot().chrome.statusMessage).toBe('Download complete: report.pdf');

      vi.advanceTimersByTime(3000);
      expect(manager.getSnapshot().chrome.statusMessage).toBe('');
    });

    it('keeps a newer message when an older timer would fire', () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });

      manager.setStatus('first', 1000);
      manager.setStatus('second');
      vi.advanceTimersByTime(1000);

      expect(manager.getSnapshot().chrome.statusMessage).toBe('second');
    });
  });
});

describe('formatWindowTitle', () => {
  it('falls back to New Tab', () => {
    expect(formatWindowTitle('Docs')).toBe('Tabshell - Docs');
    expect(formatWindowTitle('  ')).toBe('Tabshell - New Tab');
  });
});
