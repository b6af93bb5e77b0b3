import type { Unsubscribe } from './engineBridge';
import type { TabsSnapshot } from './features/tabs/types';

type TitleSource = {
  subscribe: (listener: () => void) => Unsubscribe;
  getSnapshot: () => TabsSnapshot;
};

type TitleSink = {
  write: (chunk: string) => unknown;
};

export function formatTitleSequence(title: string): string {
  // OSC 0 sets the icon name and window title; control characters would end it early.
  const safeTitle = Array.from(title)
    .filter((char) => char.charCodeAt(0) >= 32 && char.charCodeAt(0) !== 127)
    .join('');
  return `\u001B]0;${safeTitle}\u0007`;
}

/**
 * Keeps the terminal window title in step with the active tab.
 */
export function syncTerminalTitle(source: TitleSource, sink: TitleSink): Unsubscribe {
  let lastTitle: string | null = null;

  const update = () => {
    const { windowTitle } = source.getSnapshot().chrome;
    if (windowTitle === lastTitle) return;
    lastTitle = windowTitle;
    sink.write(formatTitleSequence(windowTitle));
  };

  update();
  return source.subscribe(update);
}
