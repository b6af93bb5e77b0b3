import { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { useTabs } from '../features/tabs/TabsProvider';
import { resolveAddress, type SearchOptions } from '../features/address/resolveAddress';

type AddressBarProps = {
  editing: boolean;
  onEditDone: () => void;
  searchOptions: SearchOptions;
};

function NavMarker({ label, enabled }: { label: string; enabled: boolean }) {
  return (
    <Text dimColor={!enabled} bold={enabled}>
      {label}{' '}
    </Text>
  );
}

export default function AddressBar({ editing, onEditDone, searchOptions }: AddressBarProps) {
  const { chrome, manager } = useTabs();
  const [input, setInput] = useState(chrome.addressText);

  useEffect(() => {
    if (!editing) {
      setInput(chrome.addressText);
    }
  }, [chrome.addressText, editing]);

  useInput(
    (_input, key) => {
      if (key.escape) {
        setInput(chrome.addressText);
        onEditDone();
      }
    },
    { isActive: editing },
  );

  const submit = (value: string) => {
    onEditDone();
    const target = resolveAddress(value, searchOptions);
    if (!target) return;
    void manager.navigate(target);
  };

  const isLoading = chrome.progress !== null;

  return (
    <Box>
      <Box alignItems="center">
        <NavMarker label="<" enabled={chrome.canGoBack} />
        <NavMarker label=">" enabled={chrome.canGoForward} />
        <NavMarker label={isLoading ? 'x' : 'R'} enabled={true} />
        <NavMarker label="H" enabled={true} />
      </Box>
      <Box borderStyle="round" borderColor={editing ? 'cyan' : undefined} flexGrow={1} paddingX={1}>
        {editing ? (
          <TextInput value={input} onChange={setInput} onSubmit={submit} />
        ) : chrome.addressText ? (
          <Text wrap="truncate-end">{chrome.addressText}</Text>
        ) : (
          <Text dimColor>Search or enter address (Ctrl+L)</Text>
        )}
      </Box>
    </Box>
  );
}
