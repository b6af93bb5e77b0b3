import { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { useDownloads } from '../features/downloads/DownloadProvider';
import type { DownloadItem } from '../features/downloads/types';
import { getDisplayHost } from '../features/tabs/displayTitle';

interface Props {
  download: DownloadItem;
}

export default function SavePathPrompt({ download }: Props) {
  const { manager } = useDownloads();
  const [savePath, setSavePath] = useState(() => manager.defaultSavePath(download.id));

  useInput((_input, key) => {
    if (key.escape) {
      void manager.cancel(download.id);
    }
  });

  return (
    <Box borderStyle="round" borderColor="cyan" flexDirection="column" paddingX={1}>
      <Text bold>Save download</Text>
      <Text>
        {download.filename} from {getDisplayHost(download.url)}
      </Text>
      <Box>
        <Text>Save as: </Text>
        <TextInput
          value={savePath}
          onChange={setSavePath}
          onSubmit={(value) => void manager.accept(download.id, value)}
        />
      </Box>
      <Text dimColor>Enter to save, Esc or an empty path to cancel</Text>
    </Box>
  );
}
