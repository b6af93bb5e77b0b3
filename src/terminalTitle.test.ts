import { describe, expect, it } from 'vitest';
import { TabManager } from './features/tabs/TabManager';
import { FakeEngine } from './testing/fakeEngine';
import { formatTitleSequence, syncTerminalTitle } from './terminalTitle';

describe('terminal title', () => {
  it('strips control characters from the title', () => {
    expect(formatTitleSequence('Tabshell - A\u0007B')).toBe('\u001B]0;Tabshell - AB\u0007');
  });

  it('writes the title only when it changes', async () => {
    const engine = new FakeEngine();
    const manager = new TabManager(engine, {
      homePage: 'https://home.example/',
      newTabPage: 'about:blank',
      lastTabBehavior: 'new-tab',
    });
    const written: string[] = [];
    const stop = syncTerminalTitle(manager, { write: (chunk) => written.push(chunk) });

    await manager.openTab();
    engine.views[0].emit({ type: 'title-changed', title: 'Docs' });
    engine.views[0].emit({ type: 'load-progress', progress: 50 });
    stop();
    engine.views[0].emit({ type: 'title-changed', title: 'Ignored' });

    expect(written).toEqual([
      '\u001B]0;Tabshell\u0007',
      '\u001B]0;Tabshell - New Tab\u0007',
      '\u001B]0;Tabshell - Docs\u0007',
    ]);
    manager.dispose();
  });
});
