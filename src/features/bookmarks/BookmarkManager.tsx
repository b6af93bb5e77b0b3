import { useCallback, useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import ConfirmPrompt from '../../components/ConfirmPrompt';
import { describeError, logDebug } from '../../debugLog';
import type { BookmarkStore } from './bookmarkStore';

type BookmarkManagerProps = {
  store: Pick<BookmarkStore, 'list' | 'remove'>;
  onOpen: (url: string) => void;
  onClose: () => void;
};

export default function BookmarkManager({ store, onOpen, onClose }: BookmarkManagerProps) {
  const [bookmarks, setBookmarks] = useState<string[]>([]);
  const [selected, setSelected] = useState(0);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [pendingDelete, setPendingDelete] = useState<string | null>(null);

  const refresh = useCallback(async () => {
    try {
      const next = await store.list();
      setBookmarks(next);
      setSelected((index) => Math.min(index, Math.max(next.length - 1, 0)));
      setError(null);
    } catch (listError) {
      const message = describeError(listError);
      logDebug('bookmarks', 'list-failed', { error: message });
      setError(message);
    } finally {
      setLoading(false);
    }
  }, [store]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const remove = async (url: string) => {
    try {
      await store.remove(url);
    } catch (removeError) {
      const message = describeError(removeError);
      logDebug('bookmarks', 'remove-failed', { url, error: message });
      setError(message);
      return;
    }
    await refresh();
  };

  useInput(
    (input, key) => {
      if (key.escape) {
        onClose();
        return;
      }
      if (key.upArrow) {
        setSelected((index) => Math.max(0, index - 1));
        return;
      }
      if (key.downArrow) {
        setSelected((index) => Math.min(Math.max(bookmarks.length - 1, 0), index + 1));
        return;
      }

      const current = bookmarks[selected];
      if (current === undefined) return;
      if (key.return) {
        onOpen(current);
      } else if (input === 'd' || key.delete) {
        setPendingDelete(current);
      }
    },
    { isActive: pendingDelete === null },
  );

  return (
    <Box borderStyle="round" flexDirection="column" paddingX={1}>
      <Text bold>Bookmarks</Text>
      {error ? <Text color="red">{error}</Text> : null}
      {loading ? <Text dimColor>Loading...</Text> : null}
      {!loading && !error && bookmarks.length === 0 ? <Text dimColor>No bookmarks yet</Text> : null}
      {bookmarks.map((url, index) => (
        <Text key={`${index}:${url}`} inverse={index === selected} wrap="truncate-end">
          {url}
        </Text>
      ))}
      {pendingDelete !== null ? (
        <ConfirmPrompt
          message={`Delete bookmark ${pendingDelete}?`}
          onAnswer={(yes) => {
            setPendingDelete(null);
            if (yes) void remove(pendingDelete);
          }}
        />
      ) : (
        <Text dimColor>Enter open, d delete, Esc close</Text>
      )}
    </Box>
  );
}
