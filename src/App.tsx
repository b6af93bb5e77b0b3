import { useState } from 'react';
import { Box, Text } from 'ink';
import TabsProvider, { useTabs } from './features/tabs/TabsProvider';
import TabBar from './features/tabs/TabBar';
import type { TabManager } from './features/tabs/TabManager';
import DownloadProvider, { useDownloads } from './features/downloads/DownloadProvider';
import type { DownloadManager } from './features/downloads/DownloadManager';
import BookmarkManager from './features/bookmarks/BookmarkManager';
import { addBookmarkForPage } from './features/bookmarks/bookmarkActions';
import type { BookmarkStore } from './features/bookmarks/bookmarkStore';
import type { ResolvedTarget, SearchOptions } from './features/address/resolveAddress';
import AddressBar from './components/AddressBar';
import StatusBar from './components/StatusBar';
import DownloadPopup from './components/DownloadPopup';
import SavePathPrompt from './components/SavePathPrompt';
import ConfirmPrompt from './components/ConfirmPrompt';
import { useKeyboardShortcuts, type ShortcutAction } from './hooks/useKeyboardShortcuts';
import { describeError, logDebug } from './debugLog';

export const STATUS_MESSAGE_TIMEOUT_MS = 3000;

type Dialog = 'none' | 'bookmarks' | 'downloads';

type ShellProps = {
  bookmarks: Pick<BookmarkStore, 'add' | 'contains' | 'list' | 'remove'>;
  searchOptions: SearchOptions;
  onQuit: () => void;
};

type AppProps = ShellProps & {
  tabs: TabManager;
  downloads: DownloadManager;
};

function Shell({ bookmarks, searchOptions, onQuit }: ShellProps) {
  const { manager, activeId } = useTabs();
  const { downloads, manager: downloadManager } = useDownloads();
  const [dialog, setDialog] = useState<Dialog>('none');
  const [editingAddress, setEditingAddress] = useState(false);

  const savePrompt = downloads.find((d) => d.status === 'pending');
  const openPrompt = savePrompt ? undefined : downloads.find((d) => d.openPromptPending);
  const promptOpen = savePrompt !== undefined || openPrompt !== undefined;

  const openTab = (target?: ResolvedTarget) => {
    void manager.openTab(target).catch((error: unknown) => {
      const message = describeError(error);
      logDebug('shell', 'open-tab-failed', { error: message });
      manager.setStatus(`Could not open a new tab: ${message}`);
    });
  };

  const bookmarkPage = async () => {
    const result = await addBookmarkForPage(bookmarks, manager.activeUrl());
    if (result.status === 'error') {
      logDebug('bookmarks', 'add-failed', { error: result.message });
    }
    manager.setStatus(result.message, STATUS_MESSAGE_TIMEOUT_MS);
  };

  const runShortcut = (action: ShortcutAction) => {
    switch (action.type) {
      case 'new-tab':
        openTab();
        return;
      case 'close-tab':
        void manager.closeTab(activeId);
        return;
      case 'next-tab':
        manager.activateRelative(1);
        return;
      case 'previous-tab':
        manager.activateRelative(-1);
        return;
      case 'select-tab':
        manager.activateIndex(action.number);
        return;
      case 'back':
        void manager.goBack();
        return;
      case 'forward':
        void manager.goForward();
        return;
      case 'reload':
        void manager.reload();
        return;
      case 'stop':
        void manager.stop();
        return;
      case 'home':
        void manager.goHome();
        return;
      case 'bookmark-page':
        void bookmarkPage();
        return;
      case 'open-bookmarks':
        setDialog('bookmarks');
        return;
      case 'open-downloads':
        setDialog('downloads');
        return;
      case 'edit-address':
        setEditingAddress(true);
        return;
      case 'quit':
        onQuit();
        return;
    }
  };

  useKeyboardShortcuts({
    isActive: dialog === 'none' && !editingAddress && !promptOpen,
    onShortcut: runShortcut,
  });

  return (
    <Box flexDirection="column">
      <TabBar />
      <AddressBar
        editing={editingAddress && dialog === 'none' && !promptOpen}
        onEditDone={() => setEditingAddress(false)}
        searchOptions={searchOptions}
      />
      {savePrompt ? <SavePathPrompt key={savePrompt.id} download={savePrompt} /> : null}
      {openPrompt ? (
        <ConfirmPrompt
          key={openPrompt.id}
          message={`Download complete: ${openPrompt.filename}. Open it now?`}
          onAnswer={(yes) => void downloadManager.answerOpenPrompt(openPrompt.id, yes)}
        />
      ) : null}
      {!promptOpen && dialog === 'bookmarks' ? (
        <BookmarkManager
          store={bookmarks}
          onOpen={(url) => {
            setDialog('none');
            openTab({ kind: 'url', value: url });
          }}
          onClose={() => setDialog('none')}
        />
      ) : null}
      {!promptOpen && dialog === 'downloads' ? (
        <DownloadPopup onClose={() => setDialog('none')} />
      ) : null}
      <StatusBar />
      <Text dimColor>
        Ctrl+L address  Ctrl+T new  Ctrl+W close  Ctrl+D bookmark  Ctrl+O bookmarks  Ctrl+Y downloads  Ctrl+Q quit
      </Text>
    </Box>
  );
}

export default function App({ tabs, downloads, ...shellProps }: AppProps) {
  return (
    <TabsProvider manager={tabs}>
      <DownloadProvider manager={downloads}>
        <Shell {...shellProps} />
      </DownloadProvider>
    </TabsProvider>
  );
}
