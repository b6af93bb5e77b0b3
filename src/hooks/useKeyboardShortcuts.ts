import { useInput, type Key } from 'ink';

export type ShortcutAction =
  | { type: 'new-tab' }
  | { type: 'close-tab' }
  | { type: 'next-tab' }
  | { type: 'previous-tab' }
  | { type: 'select-tab'; number: number }
  | { type: 'back' }
  | { type: 'forward' }
  | { type: 'reload' }
  | { type: 'stop' }
  | { type: 'home' }
  | { type: 'bookmark-page' }
  | { type: 'open-bookmarks' }
  | { type: 'open-downloads' }
  | { type: 'edit-address' }
  | { type: 'quit' };

export type ShortcutKey = Pick<
  Key,
  'ctrl' | 'meta' | 'shift' | 'tab' | 'escape' | 'leftArrow' | 'rightArrow'
>;

const CTRL_SHORTCUTS = new Map<string, ShortcutAction>([
  ['t', { type: 'new-tab' }],
  ['w', { type: 'close-tab' }],
  ['r', { type: 'reload' }],
  ['g', { type: 'home' }],
  ['d', { type: 'bookmark-page' }],
  ['o', { type: 'open-bookmarks' }],
  // Ctrl+J arrives as a bare line feed, which Ink reports as Enter.
  ['y', { type: 'open-downloads' }],
  ['l', { type: 'edit-address' }],
  ['q', { type: 'quit' }],
]);

// Alt+arrow arrives as an escape-prefixed sequence that Ink does not decode
// into arrow keys; `b`/`f` are the word-motion keys some terminals send.
const ALT_LEFT_INPUTS = new Set(['[1;3D', '\u001B[D', 'b']);
const ALT_RIGHT_INPUTS = new Set(['[1;3C', '\u001B[C', 'f']);

export function resolveShortcut(input: string, key: ShortcutKey): ShortcutAction | null {
  // Ink also flags a plain Tab as ctrl, so it goes first.
  if (key.tab) {
    return { type: key.shift ? 'previous-tab' : 'next-tab' };
  }

  if (key.escape) {
    return { type: 'stop' };
  }

  if (key.meta) {
    if (/^[1-9]$/.test(input)) {
      return { type: 'select-tab', number: Number(input) };
    }
    if (key.leftArrow || ALT_LEFT_INPUTS.has(input)) {
      return { type: 'back' };
    }
    if (key.rightArrow || ALT_RIGHT_INPUTS.has(input)) {
      return { type: 'forward' };
    }
    return null;
  }

  if (key.ctrl) {
    return CTRL_SHORTCUTS.get(input.toLowerCase()) ?? null;
  }

  return null;
}

interface UseKeyboardShortcutsProps {
  isActive: boolean;
  onShortcut: (action: ShortcutAction) => void;
}

export function useKeyboardShortcuts({ isActive, onShortcut }: UseKeyboardShortcutsProps) {
  useInput(
    (input, key) => {
      const action = resolveShortcut(input, key);
      if (action) {
        onShortcut(action);
      }
    },
    { isActive },
  );
}
